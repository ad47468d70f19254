import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import {
    DEFAULT_BUILD_CACHE_SIZE,
    DEFAULT_MAX_FILES,
    DEFAULT_MAX_RESULTS,
    resolveServerConfigFromEnv
} from '../config/ServerConfig.js';

describe('ServerConfig', () => {
    it('should use defaults when nothing is set', () => {
        expect(resolveServerConfigFromEnv({})).toEqual({
            rootPath: path.resolve(process.cwd()),
            maxResults: DEFAULT_MAX_RESULTS,
            maxFiles: DEFAULT_MAX_FILES,
            buildCacheSize: DEFAULT_BUILD_CACHE_SIZE,
            skipBuildGate: false
        });
    });

    it('should read every GRAPH_REFACTOR_ variable', () => {
        const config = resolveServerConfigFromEnv({
            GRAPH_REFACTOR_ROOT: '/srv/code',
            GRAPH_REFACTOR_MAX_RESULTS: '250',
            GRAPH_REFACTOR_MAX_FILES: '40',
            GRAPH_REFACTOR_BUILD_CACHE_SIZE: '0',
            GRAPH_REFACTOR_SKIP_BUILD_GATE: 'true'
        });

        expect(config).toEqual({
            rootPath: path.resolve('/srv/code'),
            maxResults: 250,
            maxFiles: 40,
            buildCacheSize: 0,
            skipBuildGate: true
        });
    });

    it('should clamp maxResults to the allowed range', () => {
        expect(resolveServerConfigFromEnv({ GRAPH_REFACTOR_MAX_RESULTS: '5000' }).maxResults).toBe(1000);
        expect(resolveServerConfigFromEnv({ GRAPH_REFACTOR_MAX_RESULTS: '0' }).maxResults).toBe(1);
    });

    it('should ignore values that are not numbers', () => {
        const config = resolveServerConfigFromEnv({ GRAPH_REFACTOR_MAX_FILES: 'lots', GRAPH_REFACTOR_SKIP_BUILD_GATE: 'yes' });

        expect(config.maxFiles).toBe(DEFAULT_MAX_FILES);
        expect(config.skipBuildGate).toBe(false);
    });

    it('should keep at least one file', () => {
        expect(resolveServerConfigFromEnv({ GRAPH_REFACTOR_MAX_FILES: '0' }).maxFiles).toBe(1);
    });
});
