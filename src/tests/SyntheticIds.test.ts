import { describe, it, expect } from '@jest/globals';
import { assignSyntheticIds, splitExtension } from '../compilation/SyntheticIds.js';

describe('SyntheticIds', () => {
    it('should keep unique file names as they are', () => {
        const ids = assignSyntheticIds(['/w/src/app.ts', '/w/src/util.ts']);

        expect(Array.from(ids.values())).toEqual(['/__graph__/app.ts', '/__graph__/util.ts']);
    });

    it('should fold the parent directory into colliding names', () => {
        const ids = assignSyntheticIds(['/w/a/index.ts', '/w/b/index.ts', '/w/a/util.ts']);

        expect(ids.get('/w/a/index.ts')).toBe('/__graph__/index.a.ts');
        expect(ids.get('/w/b/index.ts')).toBe('/__graph__/index.b.ts');
        expect(ids.get('/w/a/util.ts')).toBe('/__graph__/util.ts');
    });

    it('should append an ordinal when the parent directories match too', () => {
        const ids = assignSyntheticIds(['/w/x/core/index.ts', '/w/y/core/index.ts']);

        expect(ids.get('/w/x/core/index.ts')).toBe('/__graph__/index.core.ts');
        expect(ids.get('/w/y/core/index.ts')).toBe('/__graph__/index.core_2.ts');
    });

    it('should not reuse a name already taken by a unique file', () => {
        const ids = assignSyntheticIds(['/w/a/index.ts', '/w/b/index.ts', '/w/c/index.a.ts']);

        expect(ids.get('/w/c/index.a.ts')).toBe('/__graph__/index.a.ts');
        expect(ids.get('/w/a/index.ts')).toBe('/__graph__/index.a_2.ts');
        expect(ids.get('/w/b/index.ts')).toBe('/__graph__/index.b.ts');
    });

    it('should return entries in input order', () => {
        const paths = ['/w/b/index.ts', '/w/a/index.ts', '/w/main.ts'];
        expect(Array.from(assignSyntheticIds(paths).keys())).toEqual(paths);
    });

    it('should treat declaration suffixes as one extension', () => {
        expect(splitExtension('types.d.ts')).toEqual({ stem: 'types', ext: '.d.ts' });
        expect(splitExtension('index.ts')).toEqual({ stem: 'index', ext: '.ts' });
        expect(splitExtension('Makefile')).toEqual({ stem: 'Makefile', ext: '' });
    });
});
