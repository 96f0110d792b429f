/**
 * Tests for call-site scanning and binding resolution
 */

import { describe, it, expect } from 'vitest';
import { FatalParseError } from '../errors.js';
import { py, scanSource } from './helpers.js';

describe('scanCallSites', () => {
  it('should find a call to an imported SDK function', () => {
    const { scan } = scanSource(py('from infrar.storage import upload', '', "upload('data', 'a.csv', 'b.csv')"));

    expect(scan.sites).toHaveLength(1);
    expect(scan.failures).toHaveLength(0);
    expect(scan.sites[0]).toMatchObject({
      qualifiedName: 'infrar.storage.upload',
      function: 'upload',
      callee: 'upload',
      local: 'upload',
      line: 3,
      column: 1,
      capture: 'none',
    });
    expect(scan.sites[0].arguments.map(a => a.text)).toEqual(["'data'", "'a.csv'", "'b.csv'"]);
  });

  it.each([
    [py('import infrar.storage as st', "st.upload('b', 's', 'd')"), 'st.upload', 'upload'],
    [py('import infrar.storage', "infrar.storage.delete('b', 'p')"), 'infrar.storage.delete', 'delete'],
    [py('import infrar', "infrar.storage.delete('b', 'p')"), 'infrar.storage.delete', 'delete'],
    [py('from infrar import storage', "storage.list_objects('b')"), 'storage.list_objects', 'list_objects'],
    [py('from infrar import storage as cloud', "cloud.list_objects('b')"), 'cloud.list_objects', 'list_objects'],
    [py('from infrar.storage import download as fetch', "fetch('b', 's', 'd')"), 'fetch', 'download'],
    [py('from infrar.storage import (', '    upload,', '    delete,', ')', "delete('b', 'p')"), 'delete', 'delete'],
    [py('from infrar.storage import *', "upload('b', 's', 'd')"), 'upload', 'upload'],
  ])('should resolve the binding in %j', (source, callee, fn) => {
    const { scan } = scanSource(source);

    expect(scan.sites).toHaveLength(1);
    expect(scan.sites[0].callee).toBe(callee);
    expect(scan.sites[0].function).toBe(fn);
    expect(scan.sites[0].qualifiedName).toBe(`infrar.storage.${fn}`);
  });

  it('should find calls regardless of formatting', () => {
    const source = py(
      'from infrar.storage import upload',
      '',
      'upload(',
      "    bucket='data',",
      "    source = 'a.csv',",
      "    destination='b.csv',",
      ')'
    );
    const { scan } = scanSource(source);

    expect(scan.sites).toHaveLength(1);
    const [site] = scan.sites;
    expect(site.arguments.map(a => [a.name, a.text])).toEqual([
      ['bucket', "'data'"],
      ['source', "'a.csv'"],
      ['destination', "'b.csv'"],
    ]);
    expect(source.slice(site.span.start, site.span.end)).toBe(source.slice(source.indexOf('upload('), -1));
  });

  it('should ignore same-named functions from other modules', () => {
    const { scan } = scanSource(py('from mylib import upload', "upload('a', 'b', 'c')"));

    expect(scan.sites).toHaveLength(0);
    expect(scan.failures).toHaveLength(0);
  });

  it('should ignore unimported names and attribute calls', () => {
    const { scan } = scanSource(
      py('from infrar.storage import upload', "client.upload('a', 'b', 'c')", "storage.upload('a', 'b', 'c')")
    );

    expect(scan.sites).toHaveLength(0);
    expect(scan.references.get('upload')).toBeUndefined();
  });

  it('should ignore keyword argument names that match an SDK binding', () => {
    const { scan } = scanSource(py('from infrar.storage import upload', 'configure(upload=True)'));

    expect(scan.sites).toHaveLength(0);
    expect(scan.references.get('upload')).toBeUndefined();
  });

  it('should count every reference to an SDK-bound name', () => {
    const { scan } = scanSource(
      py('from infrar.storage import upload', "upload('a', 'b', 'c')", 'handler = upload')
    );

    expect(scan.sites).toHaveLength(1);
    expect(scan.references.get('upload')).toBe(2);
  });

  describe('ambiguous bindings', () => {
    it('should report a name also bound by def', () => {
      const source = py(
        'from infrar.storage import upload',
        '',
        'def upload(bucket, source, destination):',
        '    pass',
        '',
        "upload('data', 'a', 'b')"
      );
      const { scan } = scanSource(source);

      expect(scan.sites).toHaveLength(0);
      expect(scan.failures).toHaveLength(1);
      expect(scan.failures[0].code).toBe('ambiguous-binding');
      expect(scan.failures[0].detail).toBe(
        'upload is bound by from infrar.storage import upload (line 1), def upload (line 3)'
      );
    });

    it('should report a name also bound by assignment', () => {
      const { scan } = scanSource(
        py('from infrar.storage import delete', 'delete = print', "delete('b', 'p')")
      );

      expect(scan.failures.map(f => f.code)).toEqual(['ambiguous-binding']);
      expect(scan.failures[0].detail).toBe(
        'delete is bound by from infrar.storage import delete (line 1), delete = (line 2)'
      );
    });

    it.each([
      ['a plain parameter', ['def run(upload):', "    upload('a', 'b', 'c')"], 'parameter upload (line 2)'],
      ['a defaulted parameter', ['def run(bucket, upload=None):', "    upload('a', 'b', 'c')"], 'parameter upload (line 2)'],
      [
        'an annotated parameter',
        ['def run(upload: Callable[..., None] = print):', "    upload('a', 'b', 'c')"],
        'parameter upload (line 2)',
      ],
      ['a star parameter', ['def run(*upload):', "    upload('a', 'b', 'c')"], 'parameter upload (line 2)'],
      ['a double star parameter', ['def run(**upload):', "    upload('a', 'b', 'c')"], 'parameter upload (line 2)'],
      ['a keyword-only parameter', ['def run(*, upload):', "    upload('a', 'b', 'c')"], 'parameter upload (line 2)'],
      ['a lambda parameter', ["handler = lambda upload: upload('a', 'b', 'c')"], 'lambda parameter upload (line 2)'],
      ['a for target', ['for upload in jobs:', "    upload('a', 'b', 'c')"], 'for upload (line 2)'],
      ['a tuple for target', ['for (name, upload) in jobs:', "    upload('a', 'b', 'c')"], 'for upload (line 2)'],
      ['a comprehension target', ["results = [upload('a', 'b', 'c') for upload in jobs]"], 'for upload (line 2)'],
    ])('should report a name shadowed by %s', (_label, lines, binding) => {
      const { scan } = scanSource(py('from infrar.storage import upload', ...lines));

      expect(scan.sites).toHaveLength(0);
      expect(scan.failures.map(f => f.code)).toEqual(['ambiguous-binding']);
      expect(scan.failures[0].detail).toBe(`upload is bound by from infrar.storage import upload (line 1), ${binding}`);
    });

    it('should not treat parameters of other names as shadowing', () => {
      const { scan } = scanSource(
        py('from infrar.storage import upload', 'def run(bucket, *files, **options):', "    upload(bucket, 'a', 'b')")
      );

      expect(scan.failures).toHaveLength(0);
      expect(scan.sites.map(s => s.function)).toEqual(['upload']);
    });

    it('should report a name imported from two modules', () => {
      const { scan } = scanSource(
        py('from infrar.storage import upload', 'from legacy import upload', "upload('a', 'b', 'c')")
      );

      expect(scan.failures.map(f => f.code)).toEqual(['ambiguous-binding']);
    });
  });

  it('should report a comment inside the argument list', () => {
    const { scan } = scanSource(
      py('from infrar.storage import upload', '', 'upload(', "    'data',  # bucket", "    'a.csv',", "    'b.csv',", ')')
    );

    expect(scan.sites).toHaveLength(0);
    expect(scan.failures).toHaveLength(1);
    expect(scan.failures[0]).toMatchObject({ code: 'comment-in-arguments' });
    expect(scan.failures[0].site.line).toBe(3);
  });

  describe('capture context', () => {
    it.each([
      ["objects = list_objects('b')", 'assignment', 'objects'],
      ["found = len(list_objects('b'))", 'assignment', 'found'],
      ["print(list_objects('b'))", 'value', undefined],
      ["list_objects('b')", 'none', undefined],
    ])('should classify %j', (line, capture, target) => {
      const { scan } = scanSource(py('from infrar.storage import list_objects', line));

      expect(scan.sites[0].capture).toBe(capture);
      expect(scan.sites[0].captureTarget).toBe(target);
    });

    it('should classify a returned result', () => {
      const { scan } = scanSource(
        py('from infrar.storage import list_objects', 'def f():', "    return list_objects('b')")
      );
      expect(scan.sites[0].capture).toBe('return');
    });

    it('should classify a call in a compound header as a value', () => {
      const { scan } = scanSource(
        py('from infrar.storage import list_objects', "for item in list_objects('b'):", '    pass')
      );
      expect(scan.sites[0].capture).toBe('value');
      expect(scan.sites[0].statement).toBeUndefined();
    });
  });

  it('should mark literal and expression arguments', () => {
    const { scan } = scanSource(
      py('from infrar.storage import upload', "upload('data' 'set', name, -1)")
    );

    expect(scan.sites[0].arguments.map(a => a.literal)).toEqual([true, false, true]);
    expect(scan.sites[0].arguments[0].text).toBe("'data' 'set'");
  });

  it('should treat f-strings as expressions', () => {
    const { scan } = scanSource(py('from infrar.storage import delete', "delete('b', f'{key}.csv')"));
    expect(scan.sites[0].arguments[1].literal).toBe(false);
  });

  it('should rewrite the inner of two nested calls and report the outer', () => {
    const { scan } = scanSource(
      py('from infrar.storage import upload, download', '', "upload('data', download('data', 'a', 'b'), 'c')")
    );

    expect(scan.sites.map(s => s.function)).toEqual(['download']);
    expect(scan.failures).toHaveLength(1);
    expect(scan.failures[0]).toMatchObject({
      code: 'nested-call',
      detail: 'argument contains a call to download (line 3)',
    });
    expect(scan.failures[0].site.function).toBe('upload');
    expect(scan.failures[0].inner).toBe(scan.sites[0]);
  });

  it.each([
    ["upload('a', , 'c')", 'invalid syntax: empty argument'],
    ["upload(bucket=, source='s')", 'invalid syntax: missing argument value'],
    ["upload(bucket='a', 's', 'd')", 'positional argument follows keyword argument'],
  ])('should fail the file on a malformed recognized call %j', (line, message) => {
    const source = py('from infrar.storage import upload', line);

    expect(() => scanSource(source)).toThrow(FatalParseError);
    expect(() => scanSource(source)).toThrow(message);
  });
});
