/**
 * Tests for the rewrite state machine, import handling and edit emission
 */

import { describe, it, expect } from 'vitest';
import { Rewriter, instantiate } from '../rewriter.js';
import { emit } from '../emitter.js';
import { resolveArguments } from '../resolver.js';
import { getContractFunction } from '../contract.js';
import { RewriteStateError } from '../errors.js';
import type { Provider, SourceUnit } from '../types.js';
import type { CallScan } from '../scanner.js';
import { createRuleSource, defaultContract, defaultRepository, py, scanSource } from './helpers.js';
import { RuleRepository } from '../rules.js';

/**
 * Rewrite every resolvable site and return the emitted text
 */
function rewriteAll(unit: SourceUnit, scan: CallScan, provider: Provider, repository = defaultRepository()): string {
  const rewriter = new Rewriter(unit, repository.contract);
  for (const site of scan.sites) {
    const signature = getContractFunction(repository.contract, site.function);
    if (!signature) continue;
    const rule = repository.require(site.function, provider);
    const resolution = resolveArguments(site, rule, signature);
    if (resolution.ok) rewriter.rewriteCall(site, rule, resolution.values);
  }
  return emit(unit, rewriter.finalize(scan.references));
}

describe('Rewriter', () => {
  describe('state machine', () => {
    it('should stay unmodified without rewritten calls', () => {
      const { unit } = scanSource(py('x = 1'));
      const rewriter = new Rewriter(unit, defaultContract());

      expect(rewriter.state).toBe('unmodified');
      expect(rewriter.finalize(new Map())).toEqual([]);
      expect(rewriter.state).toBe('unmodified');
    });

    it('should move forward through partially-rewritten to finalized', () => {
      const { unit, scan } = scanSource(py('from infrar.storage import delete', "delete('b', 'k')"));
      const rule = defaultRepository().require('delete', 'aws');
      const values = new Map([
        ['bucket', { kind: 'literal' as const, text: "'b'" }],
        ['path', { kind: 'literal' as const, text: "'k'" }],
      ]);
      const rewriter = new Rewriter(unit, defaultContract());

      expect(rewriter.rewriteCall(scan.sites[0], rule, values)).toBe("s3.delete_object(Bucket='b', Key='k')");
      expect(rewriter.state).toBe('partially-rewritten');

      rewriter.finalize(scan.references);
      expect(rewriter.state).toBe('finalized');

      expect(() => rewriter.rewriteCall(scan.sites[0], rule, values)).toThrow(RewriteStateError);
      expect(() => rewriter.finalize(scan.references)).toThrow(
        'Illegal rewrite state transition: finalized -> finalized'
      );
    });
  });

  describe('instantiate', () => {
    it('should fill placeholders through the parameter map', () => {
      const source = createRuleSource();
      const repository = RuleRepository.fromSources(defaultContract(), [
        {
          name: 'mapped.json',
          data: {
            ...source,
            rules: source.rules.map(r =>
              r.function === 'delete' ? { ...r, template: 'rm(key={k}, in={b})', params: { bucket: 'b', path: 'k' } } : r
            ),
          },
        },
      ]);
      const values = new Map([
        ['bucket', { kind: 'expression' as const, text: 'cfg.bucket' }],
        ['path', { kind: 'literal' as const, text: "'a.txt'" }],
      ]);

      expect(instantiate(repository.require('delete', 'aws'), values)).toBe("rm(key='a.txt', in=cfg.bucket)");
    });

    it('should throw when a value is missing', () => {
      const rule = defaultRepository().require('delete', 'aws');
      expect(() => instantiate(rule, new Map())).toThrow('No value for placeholder {bucket} in delete on aws');
    });
  });

  describe('imports', () => {
    it('should insert imports and setup once for several calls', () => {
      const { unit, scan } = scanSource(
        py('from infrar.storage import delete', '', "delete('b', 'one')", "delete('b', 'two')")
      );

      expect(rewriteAll(unit, scan, 'aws')).toBe(
        py(
          'import boto3',
          "s3 = boto3.client('s3')",
          '',
          "s3.delete_object(Bucket='b', Key='one')",
          "s3.delete_object(Bucket='b', Key='two')"
        )
      );
    });

    it('should not duplicate statements already at top level', () => {
      const { unit, scan } = scanSource(
        py('import boto3', 'from infrar.storage import delete', '', "delete('data', 'old.csv')")
      );

      expect(rewriteAll(unit, scan, 'aws')).toBe(
        py('import boto3', "s3 = boto3.client('s3')", '', "s3.delete_object(Bucket='data', Key='old.csv')")
      );
    });

    it('should insert again a statement that only appears after the first call', () => {
      const { unit, scan } = scanSource(
        py('from infrar.storage import upload', "upload('a', 'b', 'c')", 'import boto3', "s3 = boto3.client('s3')")
      );

      expect(rewriteAll(unit, scan, 'aws')).toBe(
        py(
          'import boto3',
          "s3 = boto3.client('s3')",
          "s3.upload_file('b', 'a', 'c')",
          'import boto3',
          "s3 = boto3.client('s3')"
        )
      );
    });

    it('should place setup after a native import that follows the prologue', () => {
      const { unit, scan } = scanSource(
        py(
          '"""Job."""',
          'from infrar.storage import delete',
          'LIMIT = 3',
          'import boto3',
          '',
          'def run():',
          "    delete('b', 'k')"
        )
      );

      expect(rewriteAll(unit, scan, 'aws')).toBe(
        py(
          '"""Job."""',
          'LIMIT = 3',
          'import boto3',
          "s3 = boto3.client('s3')",
          '',
          'def run():',
          "    s3.delete_object(Bucket='b', Key='k')"
        )
      );
    });

    it('should keep SDK imports that are still referenced', () => {
      const { unit, scan } = scanSource(
        py(
          'from infrar.storage import upload, list_objects',
          '',
          "upload('b', 's', 'd')",
          "objects = list_objects('b')"
        )
      );

      expect(rewriteAll(unit, scan, 'aws')).toBe(
        py(
          'from infrar.storage import list_objects',
          'import boto3',
          "s3 = boto3.client('s3')",
          '',
          "s3.upload_file('s', 'b', 'd')",
          "objects = list_objects('b')"
        )
      );
    });

    it('should replace an import sharing its line with pass', () => {
      const { unit, scan } = scanSource(py('import os; from infrar.storage import upload', "upload('b', 's', 'd')"));

      expect(rewriteAll(unit, scan, 'aws')).toBe(
        py('import boto3', "s3 = boto3.client('s3')", 'import os; pass', "s3.upload_file('s', 'b', 'd')")
      );
    });

    it('should replace an import inside a block with pass', () => {
      const { unit, scan } = scanSource(
        py('def run():', '    from infrar.storage import delete', "    delete('b', 'k')")
      );

      expect(rewriteAll(unit, scan, 'gcp')).toBe(
        py(
          'from google.cloud import storage as gcs_storage',
          'storage_client = gcs_storage.Client()',
          'def run():',
          '    pass',
          "    storage_client.bucket('b').blob('k').delete()"
        )
      );
    });

    it('should remove a module import once its calls are rewritten', () => {
      const { unit, scan } = scanSource(
        py('import infrar.storage as st', 'import json', '', "st.delete('b', 'k')")
      );

      expect(rewriteAll(unit, scan, 'aws')).toBe(
        py('import json', 'import boto3', "s3 = boto3.client('s3')", '', "s3.delete_object(Bucket='b', Key='k')")
      );
    });

    it('should keep star imports', () => {
      const { unit, scan } = scanSource(py('from infrar.storage import *', "delete('b', 'k')"));

      expect(rewriteAll(unit, scan, 'aws')).toBe(
        py(
          'from infrar.storage import *',
          'import boto3',
          "s3 = boto3.client('s3')",
          "s3.delete_object(Bucket='b', Key='k')"
        )
      );
    });

    it('should follow the line ending style of the file', () => {
      const { unit, scan } = scanSource("from infrar.storage import delete\r\ndelete('b', 'k')\r\n");

      expect(rewriteAll(unit, scan, 'aws')).toBe(
        "import boto3\r\ns3 = boto3.client('s3')\r\ns3.delete_object(Bucket='b', Key='k')\r\n"
      );
    });
  });
});

describe('emit', () => {
  it('should return the original text without edits', () => {
    const { unit } = scanSource(py('x  =  1  # spacing kept', '', 'y=2'));
    expect(emit(unit, [])).toBe(unit.text);
  });

  it('should apply edits in offset order', () => {
    const { unit } = scanSource(py('a = 1', 'b = 2'));

    const output = emit(unit, [
      { start: 10, end: 11, text: '20' },
      { start: 0, end: 0, text: '# head\n' },
      { start: 4, end: 5, text: '10' },
    ]);
    expect(output).toBe(py('# head', 'a = 10', 'b = 20'));
  });

  it('should reject overlapping edits', () => {
    const { unit } = scanSource(py('abcdef'));
    expect(() =>
      emit(unit, [
        { start: 0, end: 4, text: 'x' },
        { start: 2, end: 5, text: 'y' },
      ])
    ).toThrow('Overlapping edits at offset 2');
  });
});
