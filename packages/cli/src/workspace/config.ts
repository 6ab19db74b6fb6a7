import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { ProjectConfigSchema, type ProjectConfig } from '@plainbook/shared';

/**
 * Loads plainbook.yaml. A missing or empty file gives the defaults.
 */
export function loadProjectConfig(path: string): ProjectConfig {
    if (!existsSync(path)) {
        return ProjectConfigSchema.parse({});
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    return ProjectConfigSchema.parse(data ?? {});
}
