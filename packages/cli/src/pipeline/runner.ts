import type { PipelineState, PipelineStep } from './types.js';
import { loadDocument } from './steps/load.js';
import { convertDirectives } from './steps/convert.js';
import { buildLedger } from './steps/build.js';
import { walkLedger } from './steps/walk.js';
import { arrow, fail } from '../utils/console.js';
import type { CommandOptions, Workspace } from '../types.js';

/**
 * Orchestrates the execution of the checking pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    ledgerPath: string,
    workspace: Workspace,
    options: CommandOptions
): Promise<PipelineState> {
    let state: PipelineState = {
        ledgerPath,
        workspace,
        options,
        directives: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Load Document', fn: loadDocument },
        { name: 'Convert Directives', fn: convertDirectives },
        { name: 'Build Ledger', fn: buildLedger },
        { name: 'Walk Ledger', fn: walkLedger },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some((e) => e.fatal)) {
            fail(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
