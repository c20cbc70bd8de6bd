import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Interpreter } from '../src/runtime/interpreter';
import { createBuiltins } from '../src/runtime/builtins';
import { FileModuleLoader, MapModuleLoader, ModuleLoader, STDLIB_DIR } from '../src/runtime/modules';
import { valueToString } from '../src/runtime/values';
import { OxError } from '../src/errors';
import { parse, runFile } from '../src/index';

describe('Modules', () => {
  function runWith(loader: ModuleLoader, source: string): { result: string; output: string[] } {
    const output: string[] = [];
    const interpreter = new Interpreter({ loader, natives: createBuiltins((line) => output.push(line)) });
    return { result: valueToString(interpreter.run(parse(source))), output };
  }

  function runError(loader: ModuleLoader, source: string): OxError {
    try {
      runWith(loader, source);
    } catch (e) {
      if (e instanceof OxError) return e;
      throw e;
    }
    throw new Error('expected the program to fail');
  }

  describe('import', () => {
    const loader = new MapModuleLoader({
      util: 'func double(x) { return x * 2 }\nsecret = 5',
      'lib.shapes': 'struct Square { side }\nfunc Square:area(self) { return self.side * self.side }',
      base: 'func inc(x) { return x + 1 }',
      combo: 'import base\nfunc twice(x) { return inc(inc(x)) }',
      peek: 'func peek() { return hidden }',
      override: 'func f() { return "module" }',
      broken: 'x = )',
    });

    it('should merge functions into the importing scope', () => {
      expect(runWith(loader, 'import util\ndouble(21)').result).toBe('42');
    });

    it('should not export plain variables', () => {
      expect(runError(loader, 'import util\nsecret').detail).toBe("Undefined variable 'secret'");
    });

    it('should import structs and their methods from dotted names', () => {
      expect(runWith(loader, 'import lib.shapes\nSquare(3):area()').result).toBe('9');
    });

    it('should re-export what a module imports', () => {
      expect(runWith(loader, 'import combo\n[twice(1), inc(1)]').result).toBe('[3, 2]');
    });

    it('should evaluate modules in their own scope', () => {
      expect(runError(loader, 'hidden = 1\nimport peek\npeek()').detail).toBe("Undefined variable 'hidden'");
    });

    it('should let the last write win', () => {
      expect(runWith(loader, 'func f() { return "main" }\nimport override\nf()').result).toBe('module');
    });

    it('should raise ImportError for a missing module', () => {
      const err = runError(loader, 'import nothing');
      expect(err.errorType).toBe('ImportError');
      expect(err.message).toBe('ImportError: Module not found: nothing at line 1, column 1');
    });

    it('should propagate errors from inside a module', () => {
      const err = runError(loader, 'import broken');
      expect(err.errorType).toBe('ParseError');
    });
  });

  describe('caching', () => {
    it('should evaluate a module once', () => {
      const loader = new MapModuleLoader({ noisy: 'print("loading")\nfunc f() { return 1 }' });
      const { result, output } = runWith(loader, 'import noisy\nimport noisy\nf()');
      expect(result).toBe('1');
      expect(output).toEqual(['loading']);
    });

    it('should resolve and parse a module once', () => {
      const loader = new MapModuleLoader(new Map([['m', 'func f() { return 1 }']]));
      const resolve = jest.spyOn(loader, 'resolve');
      runWith(loader, 'import m\nimport m\nf()');
      expect(resolve).toHaveBeenCalledTimes(1);
      expect(resolve).toHaveBeenCalledWith('m');
    });
  });

  describe('cycles', () => {
    it('should report the import chain', () => {
      const loader = new MapModuleLoader({
        a: 'import b\nfunc fa() { return 1 }',
        b: 'import a\nfunc fb() { return 2 }',
      });
      const err = runError(loader, 'import a');
      expect(err.errorType).toBe('ImportError');
      expect(err.detail).toBe('Circular import: a -> b -> a');
    });

    it('should report a module importing itself', () => {
      const loader = new MapModuleLoader({ self: 'import self' });
      expect(runError(loader, 'import self').detail).toBe('Circular import: self -> self');
    });
  });

  describe('FileModuleLoader', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ox-modules-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should map dotted names to nested files', () => {
      fs.mkdirSync(path.join(dir, 'geo'));
      const file = path.join(dir, 'geo', 'shapes.ox');
      fs.writeFileSync(file, 'func one() { return 1 }');

      const loader = new FileModuleLoader([dir]);
      expect(loader.resolve('geo.shapes')).toEqual({ name: 'geo.shapes', source: 'func one() { return 1 }', origin: file });
      expect(loader.resolve('geo.missing')).toBeUndefined();
    });

    it('should search directories in order', () => {
      const first = path.join(dir, 'first');
      const second = path.join(dir, 'second');
      fs.mkdirSync(first);
      fs.mkdirSync(second);
      fs.writeFileSync(path.join(first, 'dup.ox'), 'func which() { return "first" }');
      fs.writeFileSync(path.join(second, 'dup.ox'), 'func which() { return "second" }');
      fs.writeFileSync(path.join(second, 'only.ox'), 'func only() { return "second" }');

      const loader = new FileModuleLoader([first, second]);
      expect(runWith(loader, 'import dup\nimport only\n[which(), only()]').result).toBe('[first, second]');
    });

    it('should find the bundled standard library', () => {
      expect(new FileModuleLoader([STDLIB_DIR]).resolve('math')?.origin).toBe(path.join(STDLIB_DIR, 'math.ox'));
    });
  });

  describe('runFile()', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ox-run-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should resolve imports beside the script and from the standard library', () => {
      fs.writeFileSync(path.join(dir, 'helpers.ox'), 'func square(x) { return x * x }');
      const script = path.join(dir, 'main.ox');
      fs.writeFileSync(script, 'import helpers\nimport math\nsquare(abs(-3))');

      expect(valueToString(runFile(script, { natives: [] }))).toBe('9');
    });

    it('should apply configuration from the script directory', () => {
      fs.mkdirSync(path.join(dir, 'vendor'));
      fs.writeFileSync(path.join(dir, 'vendor', 'extra.ox'), 'func seven() { return 7 }');
      fs.writeFileSync(
        path.join(dir, 'ox.config.json'),
        JSON.stringify({ maxCallDepth: 3, modulePaths: ['vendor'] }),
      );
      const script = path.join(dir, 'main.ox');
      fs.writeFileSync(script, 'import extra\nfunc down(n) { return down(n + 1) }\nseven()');
      expect(valueToString(runFile(script, { natives: [] }))).toBe('7');

      fs.writeFileSync(script, 'func down(n) { return down(n + 1) }\ndown(0)');
      expect(() => runFile(script, { natives: [] })).toThrow('Maximum call depth of 3 exceeded');
    });
  });
});
