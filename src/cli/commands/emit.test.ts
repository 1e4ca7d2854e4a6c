/**
 * Emit Command Tests
 *
 * @module cli/commands/emit.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { CollectingSink } from '../../output/diagnostics.js';
import { listDirectory } from '../../storage/files.js';
import type { EmitPlan } from '../../schemas/emit-plan.js';
import { EmitPlanError, emitPlan, loadEmitPlan } from './emit.js';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('emit command', () => {
  let testDir: string;
  let sink: CollectingSink;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'emit-test-'));
    sink = new CollectingSink();
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  // ==========================================================================
  // loadEmitPlan
  // ==========================================================================

  describe('loadEmitPlan', () => {
    it('loads a valid plan', async () => {
      const planPath = path.join(testDir, 'plan.json');
      await fs.writeFile(
        planPath,
        JSON.stringify({ primary: 'out.xml', documents: [{ href: '', content: '<out/>' }] })
      );

      const plan = await loadEmitPlan(planPath);

      expect(plan.primary).toBe('out.xml');
      expect(plan.documents).toEqual([{ href: '', content: '<out/>' }]);
    });

    it('reports a missing plan as not-found', async () => {
      const planPath = path.join(testDir, 'missing.json');

      const error = await captureError(loadEmitPlan(planPath));

      expect(error).toBeInstanceOf(EmitPlanError);
      expect(error).toMatchObject({ code: 'not-found', message: `Emit plan not found: ${planPath}` });
    });

    it('reports malformed JSON as invalid', async () => {
      const planPath = path.join(testDir, 'plan.json');
      await fs.writeFile(planPath, '{ "documents": ');

      const error = await captureError(loadEmitPlan(planPath));

      expect(error).toMatchObject({ code: 'invalid', message: `Invalid JSON in file: ${planPath}` });
    });

    it('lists schema violations with their paths', async () => {
      const planPath = path.join(testDir, 'plan.json');
      await fs.writeFile(planPath, JSON.stringify({ documents: [] }));

      const error = await captureError(loadEmitPlan(planPath));

      expect(error).toMatchObject({
        code: 'invalid',
        message: `Invalid emit plan ${planPath}: documents: Emit plan must list at least one document`,
      });
    });
  });

  // ==========================================================================
  // emitPlan
  // ==========================================================================

  describe('emitPlan', () => {
    it('writes the primary and secondary documents', async () => {
      const plan: EmitPlan = {
        primary: 'out.xml',
        documents: [
          { href: '', content: '<out/>', settings: { mediaType: 'application/xml' } },
          { href: 'report.txt', content: ['a', 'b'] },
        ],
      };

      const outputs = await emitPlan(plan, { planDir: testDir, sink });

      expect(outputs).toEqual([
        { path: path.join(testDir, 'out.xml'), mediaType: 'application/xml', encoding: 'UTF-8' },
        { path: path.join(testDir, 'report.txt'), encoding: 'UTF-8' },
      ]);
      expect(await fs.readFile(path.join(testDir, 'out.xml'), 'utf-8')).toBe('<out/>');
      expect(await fs.readFile(path.join(testDir, 'report.txt'), 'utf-8')).toBe('a\nb\n');
      expect(await listDirectory(testDir)).toEqual(['out.xml', 'report.txt']);
    });

    it('writes nothing when a document cannot be staged', async () => {
      const plan: EmitPlan = {
        documents: [
          { href: 'a.xml', content: '<a/>' },
          { href: 'http://example/b.xml', content: '<b/>' },
        ],
      };

      const error = await captureError(emitPlan(plan, { planDir: testDir, sink }));

      expect(error).toBeInstanceOf(EmitPlanError);
      expect(error).toMatchObject({
        code: 'unstaged',
        message: '1 document(s) could not be staged; nothing was written',
      });
      expect(await listDirectory(testDir)).toEqual([]);
      expect(sink.bySeverity('error').map((d) => d.location)).toEqual(['http://example/b.xml']);
    });

    it('commits the stageable documents with allowMissing', async () => {
      const plan: EmitPlan = {
        documents: [
          { href: 'a.xml', content: '<a/>' },
          { href: 'http://example/b.xml', content: '<b/>' },
        ],
      };

      const outputs = await emitPlan(plan, { planDir: testDir, sink, allowMissing: true });

      expect(outputs.map((o) => o.path)).toEqual([path.join(testDir, 'a.xml')]);
      expect(await fs.readFile(path.join(testDir, 'a.xml'), 'utf-8')).toBe('<a/>');
    });

    it('discards the primary document when the plan has no primary', async () => {
      const plan: EmitPlan = {
        documents: [
          { href: '', content: '<out/>' },
          { href: 'a.xml', content: '<a/>' },
        ],
      };

      const outputs = await emitPlan(plan, { planDir: testDir, sink });

      expect(outputs.map((o) => o.path)).toEqual([path.join(testDir, 'a.xml')]);
      expect(await listDirectory(testDir)).toEqual(['a.xml']);
      expect(sink.bySeverity('info').map((d) => d.message)).toEqual(['Discarding primary result document']);
    });

    it('lets the primary option override the plan', async () => {
      const plan: EmitPlan = {
        primary: 'out.xml',
        documents: [{ href: '', content: '<alt/>' }],
      };

      await emitPlan(plan, { planDir: testDir, sink, primary: 'alt.xml' });

      expect(await listDirectory(testDir)).toEqual(['alt.xml']);
      expect(await fs.readFile(path.join(testDir, 'alt.xml'), 'utf-8')).toBe('<alt/>');
    });

    it('resolves hrefs against a base directory', async () => {
      const plan: EmitPlan = {
        baseOutputUri: 'build/',
        documents: [{ href: 'pages/a.html', content: '<p/>', settings: { mediaType: 'text/html' } }],
      };

      const outputs = await emitPlan(plan, { planDir: testDir, sink });

      const expected = path.join(testDir, 'build', 'pages', 'a.html');
      expect(outputs).toEqual([{ path: expected, mediaType: 'text/html', encoding: 'UTF-8' }]);
      expect(await fs.readFile(expected, 'utf-8')).toBe('<p/>');
    });

    it('keeps an existing destination when a later document fails to stage', async () => {
      const existing = path.join(testDir, 'a.xml');
      await fs.writeFile(existing, 'old');
      const plan: EmitPlan = {
        documents: [
          { href: 'a.xml', content: 'new' },
          { href: 'ftp://example/b.xml', content: '<b/>' },
        ],
      };

      await expect(emitPlan(plan, { planDir: testDir, sink })).rejects.toThrow(EmitPlanError);

      expect(await fs.readFile(existing, 'utf-8')).toBe('old');
      expect(await listDirectory(testDir)).toEqual(['a.xml']);
    });

    it('reports each document before staging it', async () => {
      const plan: EmitPlan = {
        documents: [
          { href: 'a.xml', content: '<a/>' },
          { href: 'b.xml', content: '<b/>' },
        ],
      };
      const seen: string[] = [];

      await emitPlan(plan, {
        planDir: testDir,
        sink,
        onDocument: (document, index) => seen.push(`${index}:${document.href}`),
      });

      expect(seen).toEqual(['0:a.xml', '1:b.xml']);
    });
  });
});
