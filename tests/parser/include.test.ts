/**
 * Include and Subninja Tests
 * Nested loading, scoping, failure propagation and cycle detection
 */

import { describe, expect, it } from 'vitest';
import {
  EvaluationError,
  InMemoryFileReader,
  loadManifest,
  ManifestParser,
  ManifestState,
  NinjaError,
  ParseError,
} from '../../src/index.js';
import { catchError, createEventCollector } from '../helpers/manifest.js';

describe('include and subninja', () => {
  describe('scoping', () => {
    it('include shares the current scope', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'x = 1\ninclude vars.ninja\ny = $x\n',
        'vars.ninja': 'x = 2\n',
      });
      const state = loadManifest('build.ninja', reader);
      expect(state.bindings.evaluateBinding('x')).toBe('2');
      expect(state.bindings.evaluateBinding('y')).toBe('2');
    });

    it('subninja parses into a child scope', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'x = 1\nsubninja sub.ninja\n',
        'sub.ninja': 'x = 2\nrule cc\n  command = echo $x\nbuild o: cc\n',
      });
      const state = loadManifest('build.ninja', reader);

      expect(state.bindings.evaluateBinding('x')).toBe('1');
      expect(state.bindings.keys()).toEqual(['x']);
      expect(state.edges[0]?.scope.evaluateBinding('command')).toBe('echo 2');
    });

    it('registers rules from included files globally', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'subninja sub.ninja\nbuild o: cc\n',
        'sub.ninja': 'rule cc\n  command = cc\n',
      });
      const state = loadManifest('build.ninja', reader);
      expect(state.edges[0]?.rule.name).toBe('cc');
    });

    it('expands the path against the current scope', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'dir = sub\ninclude $dir/rules.ninja\n',
        'sub/rules.ninja': 'rule cc\n  command = x\n',
      });
      const state = loadManifest('build.ninja', reader);
      expect(reader.reads).toEqual(['build.ninja', 'sub/rules.ninja']);
      expect(state.lookupRule('cc')?.file).toBe('sub/rules.ninja');
    });

    it('finishes the nested file before continuing', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'build a: phony\ninclude b.ninja\nbuild c: phony\n',
        'b.ninja': 'build b: phony\n',
      });
      const state = loadManifest('build.ninja', reader);
      expect(state.edges.map((e) => e.outputs[0])).toEqual(['a', 'b', 'c']);
    });
  });

  describe('path token', () => {
    it('ignores blanks after the path', () => {
      const reader = new InMemoryFileReader({
        'main.ninja': 'include sub.ninja  \n',
        'sub.ninja': 'x = 1\n',
      });
      const state = loadManifest('main.ninja', reader);
      expect(reader.reads).toEqual(['main.ninja', 'sub.ninja']);
      expect(state.bindings.evaluateBinding('x')).toBe('1');
    });

    it('rejects a second word after the path', () => {
      const reader = new InMemoryFileReader({
        'main.ninja': 'include sub.ninja other\n',
        'sub.ninja': '',
      });
      const err = catchError(() => loadManifest('main.ninja', reader));

      expect(err).toBeInstanceOf(ParseError);
      expect(err.errorId).toBe('NINJA-P001');
      expect(err.format()).toBe(
        "main.ninja:1:19: expected newline, got 'other'"
      );
      expect(reader.reads).toEqual(['main.ninja']);
    });

    it('requires a path', () => {
      const reader = new InMemoryFileReader({ 'main.ninja': 'include\n' });
      const err = catchError(() => loadManifest('main.ninja', reader));
      expect(err.message).toBe(
        'expected path to manifest file, got newline at 1:8'
      );
    });

    it('unescapes spaces in the path', () => {
      const reader = new InMemoryFileReader({
        'main.ninja': 'subninja my$ file.ninja\n',
        'my file.ninja': '',
      });
      loadManifest('main.ninja', reader);
      expect(reader.reads).toEqual(['main.ninja', 'my file.ninja']);
    });

    it('locates an expansion cycle at the include line', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'a = $b\nb = $a\ninclude $a\n',
      });
      const err = catchError(() => loadManifest('build.ninja', reader));

      expect(err).toBeInstanceOf(EvaluationError);
      expect(err.errorId).toBe('NINJA-E001');
      expect(err.message).toBe(
        'cycle in variable expansion: a -> b -> a at 3:1'
      );
      expect(err.format()).toBe(
        'build.ninja:3:1: cycle in variable expansion: a -> b -> a'
      );
      expect(err.cause).toBeInstanceOf(EvaluationError);
    });
  });

  describe('failures', () => {
    it('fails on a missing file and keeps earlier registrations', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'rule cc\n  command = x\ninclude missing.ninja\n',
      });
      const state = new ManifestState();
      const parser = new ManifestParser(state, reader);

      const err = catchError(() => parser.load('build.ninja'));
      expect(err).toBeInstanceOf(ParseError);
      expect(err.errorId).toBe('NINJA-P008');
      expect(err.format()).toBe(
        "build.ninja:3:1: loading 'missing.ninja': No such file or directory"
      );
      expect(state.lookupRule('cc')).toBeDefined();
    });

    it('reports an unreadable top-level file without a location', () => {
      const err = catchError(() =>
        loadManifest('nope.ninja', new InMemoryFileReader())
      );
      expect(err.errorId).toBe('NINJA-P008');
      expect(err.location).toBeUndefined();
      expect(err.message).toBe(
        "loading 'nope.ninja': No such file or directory"
      );
    });

    it('wraps an error inside the nested file', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'include bad.ninja\n',
        'bad.ninja': 'x = 1\n: oops\n',
      });
      const err = catchError(() => loadManifest('build.ninja', reader));

      expect(err.errorId).toBe('NINJA-P009');
      expect(err.message).toBe("in 'bad.ninja': 2:1: unexpected ':' at 1:1");
      expect(err.cause).toBeInstanceOf(ParseError);
      expect(err.cause).toMatchObject({
        errorId: 'NINJA-P002',
        file: 'bad.ninja',
        location: { line: 2, column: 1, offset: 6 },
      });
    });

    it('rejects an empty path', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'dir =\ninclude $dir\n',
      });
      const err = catchError(() => loadManifest('build.ninja', reader));
      expect(err.errorId).toBe('NINJA-P011');
      expect(err.message).toBe('expected path to manifest file at 2:1');
    });
  });

  describe('cycles and depth', () => {
    it('rejects a file that includes itself', () => {
      const reader = new InMemoryFileReader({ 'a.ninja': 'include a.ninja\n' });
      const err = catchError(() => loadManifest('a.ninja', reader));
      expect(err.errorId).toBe('NINJA-P012');
      expect(err.message).toBe('include cycle: a.ninja -> a.ninja at 1:1');
    });

    it('rejects an indirect cycle', () => {
      const reader = new InMemoryFileReader({
        'a.ninja': 'include b.ninja\n',
        'b.ninja': 'subninja a.ninja\n',
      });
      const err = catchError(() => loadManifest('a.ninja', reader));

      expect(err.errorId).toBe('NINJA-P009');
      const cause = err.cause;
      expect(cause).toBeInstanceOf(NinjaError);
      expect(cause).toMatchObject({
        errorId: 'NINJA-P012',
        message: 'include cycle: a.ninja -> b.ninja -> a.ninja at 1:1',
      });
    });

    it('allows the same file to be included twice in sequence', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'subninja part.ninja\nsubninja part.ninja\n',
        'part.ninja': 'x = 1\n',
      });
      expect(() => loadManifest('build.ninja', reader)).not.toThrow();
    });

    it('enforces maxIncludeDepth', () => {
      const reader = new InMemoryFileReader({
        'a.ninja': 'include b.ninja\n',
        'b.ninja': 'include c.ninja\n',
        'c.ninja': '',
      });
      const err = catchError(() =>
        loadManifest('a.ninja', reader, { maxIncludeDepth: 1 })
      );
      expect(err.errorId).toBe('NINJA-P009');
      expect(err.cause).toMatchObject({
        errorId: 'NINJA-P013',
        message: 'include depth exceeds 1 at 1:1',
      });
    });
  });

  describe('observability', () => {
    it('reports nested files in loading order', () => {
      const reader = new InMemoryFileReader({
        'build.ninja': 'x = 1\ninclude vars.ninja\ny = $x\n',
        'vars.ninja': 'x = 2\n',
      });
      const { events, callbacks } = createEventCollector();
      loadManifest('build.ninja', reader, { callbacks });

      expect(events.order).toEqual([
        'start build.ninja',
        'include vars.ninja',
        'start vars.ninja',
        'end vars.ninja',
        'end build.ninja',
      ]);
      expect(events.include).toEqual([
        { kind: 'include', path: 'vars.ninja', depth: 1 },
      ]);
      expect(events.fileStart[1]).toEqual({ file: 'vars.ninja', depth: 1 });
      expect(events.fileEnd.map((e) => e.declarations)).toEqual([1, 2]);
    });
  });
});
