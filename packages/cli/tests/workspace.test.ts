import { describe, it, expect, vi, beforeEach } from 'vitest';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveLedgerPath, resolveWorkspace } from '../src/workspace/paths.js';
import * as fs from 'node:fs';
import * as path from 'node:path';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

describe('Workspace Detection', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should detect the project root when plainbook.yaml exists', () => {
        const mockCwd = '/home/test/books';
        vi.spyOn(process, 'cwd').mockReturnValue(mockCwd);
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => p.toString().endsWith('plainbook.yaml'));

        expect(detectWorkspaceRoot()).toBe(mockCwd);
    });

    it('should bubble up to a parent directory', () => {
        vi.spyOn(fs, 'existsSync').mockImplementation(
            (p: fs.PathLike) => p.toString() === path.join('/home/test', 'plainbook.yaml')
        );

        expect(detectWorkspaceRoot('/home/test/books/2024')).toBe('/home/test');
    });

    it('should return null if no project is found in parents', () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(false);

        expect(detectWorkspaceRoot('/')).toBeNull();
    });
});

describe('Project Configuration', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should use defaults without plainbook.yaml', () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(false);

        const workspace = resolveWorkspace('/work');
        expect(workspace.configPath).toBe(path.join('/work', 'plainbook.yaml'));
        expect(workspace.config).toEqual({ ledger: 'ledger.yaml', tolerance: {}, strict: false });
    });

    it('should load plainbook.yaml', () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(true);
        vi.spyOn(fs, 'readFileSync').mockReturnValue(
            'ledger: books/main.yaml\nbooking_method: FIFO\ntolerance:\n  USD: "0.01"\nstrict: true\n'
        );

        const workspace = resolveWorkspace('/work');
        expect(workspace.config).toEqual({
            ledger: 'books/main.yaml',
            booking_method: 'FIFO',
            tolerance: { USD: '0.01' },
            strict: true,
        });
    });

    it('should reject an invalid configuration', () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(true);
        vi.spyOn(fs, 'readFileSync').mockReturnValue('booking_method: HIFO\n');

        expect(() => resolveWorkspace('/work')).toThrow();
    });
});

describe('Ledger Path Resolution', () => {
    it('should resolve the configured ledger against the project root', () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(false);
        const workspace = resolveWorkspace('/work');

        expect(resolveLedgerPath(workspace)).toBe(path.join('/work', 'ledger.yaml'));
    });

    it('should prefer a path given on the command line', () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(false);
        const workspace = resolveWorkspace('/work');

        expect(resolveLedgerPath(workspace, '/elsewhere/books.yaml')).toBe('/elsewhere/books.yaml');
    });
});
