import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveLedgerPath, resolveWorkspace } from '../workspace/paths.js';
import { runPipeline } from '../pipeline/runner.js';
import type { PipelineState } from '../pipeline/types.js';
import { arrow, fail, log, success, warn } from '../utils/console.js';
import type { CommandOptions, Workspace } from '../types.js';

/**
 * Exit status for a finished pipeline: any error fails the run,
 * and so does any warning under --strict.
 */
export function exitCode(state: PipelineState, strict: boolean): number {
    if (state.errors.length > 0) return 1;
    if (strict && state.warnings.length > 0) return 1;
    return 0;
}

/**
 * Locates the project, loads its configuration and runs the pipeline.
 * Warnings and errors are printed; the caller reports the result.
 */
export async function prepareLedger(options: CommandOptions): Promise<PipelineState> {
    const root = options.workspace ?? detectWorkspaceRoot() ?? process.cwd();
    let workspace: Workspace;
    try {
        workspace = resolveWorkspace(root);
    } catch (err) {
        fail(`Error: Failed to load project configuration. ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    }

    const ledgerPath = resolveLedgerPath(workspace, options.ledger);
    arrow(`Ledger: ${ledgerPath}`);

    const state = await runPipeline(ledgerPath, workspace, {
        ...options,
        strict: options.strict || workspace.config.strict,
    });

    if (state.warnings.length > 0 || state.errors.length > 0) {
        log('');
    }
    for (const w of state.warnings) {
        warn(w);
    }
    for (const e of state.errors) {
        fail(`ERROR [${e.step}]: ${e.message}`);
    }

    if (state.errors.some((e) => e.fatal)) {
        log('\n✖ Checking failed with fatal errors.');
        process.exit(1);
    }
    if (state.errors.length === 0) {
        success('Ledger loaded.');
    }
    return state;
}
