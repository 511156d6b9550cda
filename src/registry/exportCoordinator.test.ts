import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ConfigurationError,
  ExporterFailureError,
  ExportTimeoutError,
  UnknownTransactionError,
} from '../errors.js';
import { createLogger, type DiagnosticEntry } from '../logging/logger.js';
import {
  createGatedExporter,
  createRecordingExporter,
  type RecordingExporter,
} from '../test/mockExporters.js';
import { createExportCoordinator, type ExportCoordinator } from './exportCoordinator.js';
import { createTransactionRegistry, type TransactionRegistry } from './transactionRegistry.js';

describe('ExportCoordinator', () => {
  let registry: TransactionRegistry;
  let exporter: RecordingExporter;
  let coordinator: ExportCoordinator;
  let diagnostics: DiagnosticEntry[];

  beforeEach(() => {
    diagnostics = [];
    registry = createTransactionRegistry({ level: 'DEBUG' });
    exporter = createRecordingExporter();
    coordinator = createExportCoordinator({
      registry,
      exporter,
      config: { filepath: '/tmp', filename: 'app' },
      logger: createLogger({ level: 'debug', output: (entry) => diagnostics.push(entry) }),
    });
  });

  async function openWith(...messages: string[]): Promise<string> {
    const traceId = registry.open();
    for (const message of messages) {
      await registry.record('INFO', traceId, message);
    }
    return traceId;
  }

  // ─── flush ─────────────────────────────────────────────────────────────

  describe('flush', () => {
    it('should reject unknown trace IDs without calling the exporter', async () => {
      await expect(coordinator.flush('missing')).rejects.toBeInstanceOf(UnknownTransactionError);
      expect(exporter.calls).toHaveLength(0);
    });

    it('should pass trace ID, entries and config to the exporter', async () => {
      const traceId = await openWith('one', 'two');

      await coordinator.flush(traceId);

      expect(exporter.calls).toHaveLength(1);
      const call = exporter.calls[0];
      expect(call?.traceId).toBe(traceId);
      expect(call?.entries.map((e) => e.message)).toEqual(['one', 'two']);
      expect(call?.config).toEqual({ filepath: '/tmp', filename: 'app' });
    });

    it('should remove the transaction after a successful export', async () => {
      const traceId = await openWith('one');

      await coordinator.flush(traceId);

      expect(registry.lookup(traceId)).toBeUndefined();
      await expect(coordinator.flush(traceId)).rejects.toBeInstanceOf(UnknownTransactionError);
      expect(exporter.calls).toHaveLength(1);
    });

    it('should export and remove a transaction with no entries', async () => {
      const traceId = registry.open();

      await coordinator.flush(traceId);

      expect(exporter.calls[0]?.entries).toEqual([]);
      expect(registry.size()).toBe(0);
    });

    it('should wrap exporter errors and keep the transaction intact', async () => {
      const traceId = await openWith('one', 'two');
      exporter.failFor.add(traceId);

      const error = await coordinator.flush(traceId).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExporterFailureError);
      expect(error).toMatchObject({
        code: 'EXPORTER_FAILURE',
        traceId,
        cause: exporter.failure,
        message: `export failed for trace ID ${traceId}: mock error`,
      });
      expect(registry.lookup(traceId)?.spans.map((s) => s.message)).toEqual(['one', 'two']);
    });

    it('should allow a retry after a failed export', async () => {
      const traceId = await openWith('one');
      exporter.failFor.add(traceId);
      await expect(coordinator.flush(traceId)).rejects.toBeInstanceOf(ExporterFailureError);

      exporter.failFor.clear();
      await coordinator.flush(traceId);

      expect(exporter.calls.map((c) => c.traceId)).toEqual([traceId, traceId]);
      expect(registry.lookup(traceId)).toBeUndefined();
    });

    it('should pass configuration errors through unwrapped', async () => {
      const traceId = await openWith('one');
      exporter.failFor.add(traceId);
      exporter.failure = new ConfigurationError('no filepath in config');

      await expect(coordinator.flush(traceId)).rejects.toBe(exporter.failure);
      expect(registry.lookup(traceId)).toBeDefined();
    });

    it('should log success at debug and failure at warn', async () => {
      const ok = await openWith('one');
      const bad = await openWith('two');
      exporter.failFor.add(bad);

      await coordinator.flush(ok);
      await coordinator.flush(bad).catch(() => undefined);

      expect(diagnostics.map((d) => [d.level, d.message, d.component])).toEqual([
        ['debug', 'transaction exported', 'exportCoordinator'],
        ['warn', 'transaction export failed', 'exportCoordinator'],
      ]);
      expect(diagnostics[0]?.metadata).toEqual({ traceId: ok, entryCount: 1 });
      expect(diagnostics[1]?.error).toMatchObject({
        name: 'ExporterFailureError',
        code: 'EXPORTER_FAILURE',
      });
    });

    it('should use the exporter and config set most recently', async () => {
      const traceId = await openWith('one');
      const replacement = createRecordingExporter();

      coordinator.setExporter(replacement);
      coordinator.setConfig(undefined);
      await coordinator.flush(traceId);

      expect(exporter.calls).toHaveLength(0);
      expect(replacement.calls[0]?.config).toBeUndefined();
      expect(coordinator.exporter).toBe(replacement);
      expect(coordinator.config).toBeUndefined();
    });
  });

  // ─── in-flight exports ─────────────────────────────────────────────────

  describe('in-flight exports', () => {
    it('should join a flush already in flight for the same transaction', async () => {
      const gated = createGatedExporter();
      coordinator.setExporter(gated);
      const traceId = await openWith('one');

      const first = coordinator.flush(traceId);
      const second = coordinator.flush(traceId);

      expect(second).toBe(first);
      expect(coordinator.isFlushing(traceId)).toBe(true);
      expect(gated.started).toBe(1);

      gated.release();
      await Promise.all([first, second]);

      expect(coordinator.isFlushing(traceId)).toBe(false);
      expect(registry.lookup(traceId)).toBeUndefined();
    });

    it('should fail records issued during a flush that then succeeds', async () => {
      const gated = createGatedExporter();
      coordinator.setExporter(gated);
      const traceId = await openWith('one');

      const flushing = coordinator.flush(traceId);
      const late = expect(registry.record('INFO', traceId, 'late')).rejects.toBeInstanceOf(
        UnknownTransactionError,
      );
      gated.release();

      await flushing;
      await late;
    });

    it('should append records issued during a flush that then fails', async () => {
      const gated = createGatedExporter();
      coordinator.setExporter(gated);
      const traceId = await openWith('one');

      const flushing = expect(coordinator.flush(traceId)).rejects.toBeInstanceOf(
        ExporterFailureError,
      );
      const late = registry.record('INFO', traceId, 'late');
      gated.fail(new Error('disk full'));

      await flushing;
      await late;
      expect(registry.lookup(traceId)?.spans.map((s) => s.message)).toEqual(['one', 'late']);
    });

    it('should not hold up other transactions while an export is in flight', async () => {
      const gated = createGatedExporter();
      coordinator.setExporter(gated);
      const busy = await openWith('one');
      const flushing = coordinator.flush(busy);

      const other = registry.open();
      const entry = await registry.record('ERROR', other, 'independent');

      expect(entry?.message).toBe('independent');
      expect(coordinator.isFlushing(other)).toBe(false);

      gated.release();
      await flushing;
    });

    it('should time out a slow exporter and keep the transaction', async () => {
      const gated = createGatedExporter();
      const timed = createExportCoordinator({ registry, exporter: gated, exportTimeoutMs: 20 });
      const traceId = await openWith('one');

      const error = await timed.flush(traceId).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExportTimeoutError);
      expect(error).toBeInstanceOf(ExporterFailureError);
      expect(error).toMatchObject({ code: 'EXPORT_TIMEOUT', timeoutMs: 20, traceId });
      expect(registry.lookup(traceId)?.spans).toHaveLength(1);
      expect(gated.signals[0]?.aborted).toBe(true);
      expect(timed.isFlushing(traceId)).toBe(true);

      gated.fail(new Error('aborted'));
      await vi.waitFor(() => expect(timed.isFlushing(traceId)).toBe(false), { interval: 1 });
      expect(registry.lookup(traceId)?.spans).toHaveLength(1);
    });

    it('should not start a second export while a timed-out one is still running', async () => {
      const gated = createGatedExporter();
      const timed = createExportCoordinator({ registry, exporter: gated, exportTimeoutMs: 20 });
      const traceId = await openWith('one');
      await expect(timed.flush(traceId)).rejects.toBeInstanceOf(ExportTimeoutError);

      const retry = timed.flush(traceId);

      expect(gated.started).toBe(1);
      gated.release();
      await retry;

      expect(gated.started).toBe(1);
      expect(registry.lookup(traceId)).toBeUndefined();
      expect(timed.isFlushing(traceId)).toBe(false);
    });

    it('should export again once a timed-out export finally fails', async () => {
      const gated = createGatedExporter();
      const timed = createExportCoordinator({ registry, exporter: gated, exportTimeoutMs: 200 });
      const traceId = await openWith('one');
      await expect(timed.flush(traceId)).rejects.toBeInstanceOf(ExportTimeoutError);

      const retry = timed.flush(traceId);
      gated.fail(new Error('aborted'));
      await vi.waitFor(() => expect(gated.started).toBe(2), { interval: 1 });
      gated.release();
      await retry;

      expect(registry.lookup(traceId)).toBeUndefined();
    });

    it('should hold records back until a timed-out export returns', async () => {
      const gated = createGatedExporter();
      const timed = createExportCoordinator({ registry, exporter: gated, exportTimeoutMs: 20 });
      const traceId = await openWith('one');
      await expect(timed.flush(traceId)).rejects.toBeInstanceOf(ExportTimeoutError);

      const late = expect(registry.record('INFO', traceId, 'late')).rejects.toBeInstanceOf(
        UnknownTransactionError,
      );
      gated.release();

      await late;
      expect(gated.started).toBe(1);
    });
  });

  // ─── flushAll ──────────────────────────────────────────────────────────

  describe('flushAll', () => {
    it('should resolve when nothing is registered', async () => {
      await expect(coordinator.flushAll()).resolves.toBeUndefined();
      expect(exporter.calls).toHaveLength(0);
    });

    it('should export every transaction exactly once and empty the registry', async () => {
      const a = await openWith('a1', 'a2');
      const b = await openWith('b1');

      await coordinator.flushAll();

      const exported = new Map(
        exporter.calls.map((c) => [c.traceId, c.entries.map((e) => e.message)]),
      );
      expect(exporter.calls).toHaveLength(2);
      expect(exported.get(a)).toEqual(['a1', 'a2']);
      expect(exported.get(b)).toEqual(['b1']);
      expect(registry.size()).toBe(0);
    });

    it('should keep failed transactions and remove the rest', async () => {
      const ok = await openWith('ok');
      const bad = await openWith('bad');
      exporter.failFor.add(bad);

      const error = await coordinator.flushAll().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExporterFailureError);
      expect(error).toMatchObject({ traceId: bad });
      expect(registry.lookup(ok)).toBeUndefined();
      expect(registry.lookup(bad)?.spans.map((s) => s.message)).toEqual(['bad']);
    });

    it('should report one failure when several exports fail', async () => {
      const first = await openWith('first');
      const second = await openWith('second');
      exporter.failFor.add(first);
      exporter.failFor.add(second);

      const error = await coordinator.flushAll().catch((e: unknown) => e);

      expect(error).toMatchObject({ traceId: first });
      expect(registry.traceIds()).toEqual([first, second]);
      const summary = diagnostics.find((d) => d.message.startsWith('multiple'));
      expect(summary?.metadata).toEqual({ failed: 2, total: 2 });
    });

    it('should not export transactions opened after the snapshot', async () => {
      const gated = createGatedExporter();
      coordinator.setExporter(gated);
      await openWith('early');

      const all = coordinator.flushAll();
      const late = registry.open();
      gated.release();
      await all;

      expect(gated.started).toBe(1);
      expect(registry.traceIds()).toEqual([late]);
    });
  });
});
