import { isAbsolute, join, resolve } from 'node:path';
import { PROJECT_CONFIG_FILE } from '@plainbook/shared';
import { loadProjectConfig } from './config.js';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path, loading its configuration.
 */
export function resolveWorkspace(root: string): Workspace {
    const configPath = join(root, PROJECT_CONFIG_FILE);
    return {
        root,
        configPath,
        config: loadProjectConfig(configPath),
    };
}

/**
 * Ledger document to load: the command line path (relative to the working
 * directory) wins over the configured one (relative to the project root).
 */
export function resolveLedgerPath(workspace: Workspace, override?: string): string {
    if (override !== undefined) {
        return resolve(override);
    }
    const configured = workspace.config.ledger;
    return isAbsolute(configured) ? configured : join(workspace.root, configured);
}
