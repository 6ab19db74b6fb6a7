import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { LedgerDocumentSchema } from '@plainbook/shared';
import type { PipelineStep } from '../types.js';

/**
 * Step 1: Load
 * Reads the ledger document and validates its shape.
 */
export const loadDocument: PipelineStep = async (state) => {
    let data: unknown;
    try {
        const content = await readFile(state.ledgerPath, 'utf-8');
        data = parse(content);
    } catch (err) {
        state.errors.push({
            step: 'load',
            message: `Failed to read ${state.ledgerPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    const parsed = LedgerDocumentSchema.safeParse(data ?? {});
    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            state.errors.push({
                step: 'load',
                message: `${issue.path.join('.') || '(document)'}: ${issue.message}`,
                fatal: true,
            });
        }
        return state;
    }

    state.document = parsed.data;
    if (parsed.data.directives.length === 0) {
        state.warnings.push(`No directives found in ${state.ledgerPath}.`);
    }
    return state;
};
