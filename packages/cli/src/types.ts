/**
 * plainbook CLI - Core Types
 */

import type { ProjectConfig } from '@plainbook/shared';

export type CommandName = 'check' | 'print' | 'holdings';

export interface CommandOptions {
    /** Ledger document path; overrides the project configuration. */
    ledger?: string;
    /** Project root; detected from the working directory when absent. */
    workspace?: string;
    /** Treat warnings as failures. */
    strict: boolean;
}

export interface Workspace {
    /** Directory holding plainbook.yaml, or the working directory when there is none. */
    root: string;
    configPath: string;
    config: ProjectConfig;
}
