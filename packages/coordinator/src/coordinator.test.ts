import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type {
  DailySummaryEvent,
  FileFailedEvent,
  FileOutcome,
  FileSucceededEvent,
  NotificationEvent,
  ProcessingNotifier,
} from '@invoice-bridge/contracts';
import { parseSalesInvoice } from '@invoice-bridge/parser';
import type { Clock } from '@invoice-bridge/shared';
import { renderInvoiceXml } from '@invoice-bridge/transformer';
import { buildProcessorConfig, type ProcessorConfigOverrides } from './config/processor-config.js';
import { FileLifecycleCoordinator } from './coordinator.js';
import { ExclusiveOpenProbe, type FileLockProbe, type LockProbeResult } from './lock/lock-probe.js';
import { captureLogger, createWorkspace, type CapturedLine, type TestWorkspace } from './testing/workspace.js';
import { deferred } from './testing/deferred.js';

const fixture = (name: string): string =>
  readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8');

const VALID_INVOICE = fixture('single-line-invoice.xml');
const WRONG_ROOT = fixture('wrong-root.xml');

/**
 * Real exclusive-open probe, except that a name reports locked for a set
 * number of probes. An optional gate holds every probe until released.
 */
class FakeLockProbe implements FileLockProbe {
  readonly lockedProbes = new Map<string, number>();
  readonly probed: string[] = [];
  gate: Promise<void> | null = null;
  private readonly real = new ExclusiveOpenProbe({ settleMs: 0 });

  async probe(filePath: string): Promise<LockProbeResult> {
    const name = basename(filePath);
    this.probed.push(name);
    if (this.gate) await this.gate;

    const remaining = this.lockedProbes.get(name) ?? 0;
    if (remaining > 0) {
      this.lockedProbes.set(name, remaining - 1);
      return 'locked';
    }
    return this.real.probe(filePath);
  }
}

class RecordingNotifier implements ProcessingNotifier {
  readonly events: NotificationEvent[] = [];

  onFileSucceeded(event: FileSucceededEvent): void {
    this.events.push(event);
  }

  onFileFailed(event: FileFailedEvent): void {
    this.events.push(event);
  }

  onDailySummary(event: DailySummaryEvent): void {
    this.events.push(event);
  }
}

class MutableClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = date;
  }
}

describe('FileLifecycleCoordinator', () => {
  let ws: TestWorkspace;
  let probe: FakeLockProbe;
  let notifier: RecordingNotifier;
  let clock: MutableClock;
  let lines: CapturedLine[];
  let sleeps: number[];
  let outcomes: FileOutcome[];
  let coordinator: FileLifecycleCoordinator | undefined;

  beforeEach(async () => {
    ws = await createWorkspace();
    await mkdir(ws.input, { recursive: true });
    probe = new FakeLockProbe();
    notifier = new RecordingNotifier();
    clock = new MutableClock(new Date(2024, 0, 15, 9, 30, 0));
    sleeps = [];
    outcomes = [];
    coordinator = undefined;
  });

  afterEach(async () => {
    await coordinator?.stop();
    await ws.dispose();
  });

  function create(
    overrides: ProcessorConfigOverrides = {},
    options: { notifier?: ProcessingNotifier; onOutcome?: (outcome: FileOutcome) => void } = {},
  ) {
    const { config } = buildProcessorConfig(
      {
        inputDirectory: ws.input,
        outputDirectory: ws.output,
        archiveDirectory: ws.archive,
        errorDirectory: ws.error,
        logDirectory: ws.logs,
        lockRetry: { maxAttempts: 3, baseDelayMs: 100 },
        debounceMs: 20,
      },
      overrides,
    );
    const captured = captureLogger();
    lines = captured.lines;
    const created = new FileLifecycleCoordinator({
      config,
      notifier: options.notifier ?? notifier,
      logger: captured.logger,
      clock,
      lockProbe: probe,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      onOutcome: (outcome) => {
        outcomes.push(outcome);
        options.onOutcome?.(outcome);
      },
    });
    coordinator = created;
    return created;
  }

  const drop = (name: string, content: string): Promise<void> => writeFile(join(ws.input, name), content, 'utf8');

  describe('success', () => {
    it('should transform a valid file and archive the source', async () => {
      const c = create();
      await drop('INV2001.xml', VALID_INVOICE);

      const outcome = await c.processFile(join(ws.input, 'INV2001.xml'));

      expect(outcome).toEqual({
        status: 'success',
        fileName: 'INV2001.xml',
        outputPath: join(ws.output, 'INV2001_Transformed_20240115_093000.xml'),
        archivePath: join(ws.archive, 'INV2001_20240115_093000.xml'),
      });
      expect(await ws.list(ws.output)).toEqual(['INV2001_Transformed_20240115_093000.xml']);
      expect(await ws.list(ws.archive)).toEqual(['INV2001_20240115_093000.xml']);
      expect(await ws.list(ws.input)).toEqual([]);
      expect(await ws.list(ws.error)).toEqual([]);
      expect(c.getMetrics().successCount).toBe(1);
      expect(c.getMetrics().errorCount).toBe(0);
    });

    it('should write the rendered invoice', async () => {
      const c = create();
      await drop('INV2001.xml', VALID_INVOICE);

      await c.processFile(join(ws.input, 'INV2001.xml'));

      const written = await readFile(join(ws.output, 'INV2001_Transformed_20240115_093000.xml'), 'utf8');
      expect(written).toBe(renderInvoiceXml(parseSalesInvoice(VALID_INVOICE, { processingDate: '2024-01-15' })));
      expect(written.match(/<InvoiceLine>/g)).toHaveLength(1);
      expect(written).toContain('<SuppliersInvoiceNumber>2001</SuppliersInvoiceNumber>');
    });

    it('should decode a source in the encoding it declares', async () => {
      const c = create();
      const text = VALID_INVOICE.replace('encoding="utf-8"', 'encoding="ISO-8859-1"').replace(
        'Name="Example Supplies Ltd"',
        'Name="£ Example Supplies"',
      );
      await writeFile(join(ws.input, 'INV2001.xml'), Buffer.from(text, 'latin1'));

      const outcome = await c.processFile(join(ws.input, 'INV2001.xml'));

      expect(outcome.status).toBe('success');
      const written = await readFile(join(ws.output, 'INV2001_Transformed_20240115_093000.xml'), 'utf8');
      expect(written).toBe(renderInvoiceXml(parseSalesInvoice(text, { processingDate: '2024-01-15' })));
      expect(written).toContain('<Party>£ Example Supplies</Party>');
    });

    it('should delete the source when archiving is off', async () => {
      const c = create({ archiveProcessedFiles: false });
      await drop('INV2001.xml', VALID_INVOICE);

      const outcome = await c.processFile(join(ws.input, 'INV2001.xml'));

      expect(outcome.status).toBe('success');
      expect(await ws.list(ws.input)).toEqual([]);
      expect(await ws.list(ws.archive)).toEqual([]);
      expect(await ws.list(ws.output)).toEqual(['INV2001_Transformed_20240115_093000.xml']);
    });

    it('should publish a success notification', async () => {
      const c = create();
      await drop('INV2001.xml', VALID_INVOICE);

      await c.processFile(join(ws.input, 'INV2001.xml'));
      await c.whenIdle();

      expect(notifier.events).toEqual([
        {
          type: 'file-succeeded',
          timestamp: new Date(2024, 0, 15, 9, 30, 0).toISOString(),
          fileName: 'INV2001.xml',
          outputFileName: 'INV2001_Transformed_20240115_093000.xml',
          archiveFileName: 'INV2001_20240115_093000.xml',
          durationMs: 0,
        },
      ]);
    });
  });

  describe('failure', () => {
    it('should quarantine a document with the wrong root', async () => {
      const c = create();
      await drop('bad.xml', WRONG_ROOT);

      const outcome = await c.processFile(join(ws.input, 'bad.xml'));

      expect(outcome).toEqual({
        status: 'failure',
        fileName: 'bad.xml',
        message: "Unexpected root element 'PurchaseOrder'. Expected 'SalesInvoicePrint'.",
        code: 'FORMAT_ERROR',
        errorPath: join(ws.error, 'bad_20240115_093000_ERROR.xml'),
      });
      expect(await ws.list(ws.error)).toEqual(['bad_20240115_093000_ERROR.txt', 'bad_20240115_093000_ERROR.xml']);
      expect(await readFile(join(ws.error, 'bad_20240115_093000_ERROR.txt'), 'utf8')).toBe(
        'Error processing file: bad.xml\n' +
          'Timestamp: 2024-01-15 09:30:00\n' +
          "Error: Unexpected root element 'PurchaseOrder'. Expected 'SalesInvoicePrint'.\n",
      );
      expect(await ws.list(ws.output)).toEqual([]);
      expect(await ws.list(ws.input)).toEqual([]);
      expect(c.getMetrics().errorCount).toBe(1);
      expect(c.getMetrics().successCount).toBe(0);
    });

    it('should quarantine malformed XML', async () => {
      const c = create();
      await drop('broken.xml', '<SalesInvoicePrint><Invoice></SalesInvoicePrint>');

      const outcome = await c.processFile(join(ws.input, 'broken.xml'));

      expect(outcome.status).toBe('failure');
      if (outcome.status === 'failure') {
        expect(outcome.code).toBe('FORMAT_ERROR');
        expect(outcome.message).toMatch(/^Malformed XML: /);
      }
    });

    it('should publish a failure notification with the stack as detail', async () => {
      const c = create();
      await drop('bad.xml', WRONG_ROOT);

      await c.processFile(join(ws.input, 'bad.xml'));
      await c.whenIdle();

      expect(notifier.events).toHaveLength(1);
      const [event] = notifier.events;
      expect(event?.type).toBe('file-failed');
      if (event?.type === 'file-failed') {
        expect(event.fileName).toBe('bad.xml');
        expect(event.code).toBe('FORMAT_ERROR');
        expect(event.errorFileName).toBe('bad_20240115_093000_ERROR.xml');
        expect(event.detail).toContain("Unexpected root element 'PurchaseOrder'");
      }
    });

    it('should roll back the output and quarantine when the source cannot be archived', async () => {
      const c = create();
      await writeFile(ws.archive, 'not a directory', 'utf8');
      await drop('INV2001.xml', VALID_INVOICE);

      const outcome = await c.processFile(join(ws.input, 'INV2001.xml'));

      expect(outcome.status).toBe('failure');
      if (outcome.status === 'failure') {
        expect(outcome.code).toBe('WRITE_ERROR');
        expect(outcome.message).toMatch(/^Cannot archive source file: /);
      }
      expect(await ws.list(ws.output)).toEqual([]);
      expect(await ws.list(ws.error)).toEqual([
        'INV2001_20240115_093000_ERROR.txt',
        'INV2001_20240115_093000_ERROR.xml',
      ]);
    });

    it('should leave the file in place when quarantine fails', async () => {
      const c = create();
      await writeFile(ws.error, 'not a directory', 'utf8');
      await drop('bad.xml', WRONG_ROOT);

      const outcome = await c.processFile(join(ws.input, 'bad.xml'));

      expect(outcome).toMatchObject({ status: 'failure', errorPath: null });
      expect(await ws.list(ws.input)).toEqual(['bad.xml']);
      expect(lines.some((l) => l.level === 'error' && l.line.includes('leaving it in place'))).toBe(true);
    });

    it('should keep processing other files after a failure', async () => {
      const c = create();
      await drop('a-bad.xml', WRONG_ROOT);
      await drop('b-good.xml', VALID_INVOICE);

      expect(await c.scan()).toBe(2);
      await c.whenIdle();

      expect(outcomes.map((o) => [o.fileName, o.status])).toEqual([
        ['a-bad.xml', 'failure'],
        ['b-good.xml', 'success'],
      ]);
      expect(c.getMetrics()).toMatchObject({ successCount: 1, errorCount: 1 });
    });
  });

  describe('claiming', () => {
    it('should process a file seen by the startup scan and the first poll once', async () => {
      const c = create();
      await drop('INV2001.xml', VALID_INVOICE);
      const gate = deferred();
      probe.gate = gate.promise;

      expect(await c.scan('startup-scan')).toBe(1);
      expect(await c.scan('poll')).toBe(0);
      expect(c.enqueue(join(ws.input, '.', 'INV2001.xml'), 'watch')).toBe(false);

      gate.resolve();
      await c.whenIdle();

      expect(outcomes.map((o) => o.status)).toEqual(['success']);
      expect(await ws.list(ws.output)).toEqual(['INV2001_Transformed_20240115_093000.xml']);
      expect(probe.probed).toEqual(['INV2001.xml']);
    });

    it('should share the in-flight outcome with a concurrent processFile call', async () => {
      const c = create();
      await drop('INV2001.xml', VALID_INVOICE);

      const first = c.processFile(join(ws.input, 'INV2001.xml'));
      const second = c.processFile(join(ws.input, 'INV2001.xml'));

      expect(await second).toEqual(await first);
      expect(outcomes).toHaveLength(1);
    });

    it('should accept processFile for the same path from the outcome callback', async () => {
      let followUp: Promise<FileOutcome> | undefined;
      const c: FileLifecycleCoordinator = create(
        {},
        {
          onOutcome: () => {
            if (followUp === undefined) {
              followUp = c.processFile(join(ws.input, 'INV2001.xml'));
            }
          },
        },
      );
      await drop('INV2001.xml', VALID_INVOICE);

      const first = await c.processFile(join(ws.input, 'INV2001.xml'));

      expect(first.status).toBe('success');
      expect(await followUp).toEqual({ status: 'vanished', fileName: 'INV2001.xml' });
      expect(outcomes.map((o) => o.status)).toEqual(['success', 'vanished']);
    });

    it('should treat an already routed path as vanished', async () => {
      const c = create();

      const outcome = await c.processFile(join(ws.input, 'gone.xml'));

      expect(outcome).toEqual({ status: 'vanished', fileName: 'gone.xml' });
      expect(c.getMetrics()).toMatchObject({ successCount: 0, errorCount: 0 });
      expect(await ws.list(ws.error)).toEqual([]);
    });

    it('should only scan xml files', async () => {
      const c = create();
      await drop('notes.txt', 'hello');
      await drop('UPPER.XML', VALID_INVOICE);

      expect(await c.scan()).toBe(1);
      await c.whenIdle();
      expect(await ws.list(ws.input)).toEqual(['notes.txt']);
    });
  });

  describe('lock retry', () => {
    it('should abandon a file that stays locked and pick it up on the next poll', async () => {
      const c = create();
      await drop('held.xml', VALID_INVOICE);
      probe.lockedProbes.set('held.xml', 3);

      const abandoned = await c.processFile(join(ws.input, 'held.xml'));

      expect(abandoned).toEqual({ status: 'abandoned', fileName: 'held.xml', attempts: 3 });
      expect(sleeps).toEqual([100, 200]);
      expect(await ws.list(ws.input)).toEqual(['held.xml']);
      expect(await ws.list(ws.output)).toEqual([]);
      const warnings = lines.filter((l) => l.level === 'warn').map((l) => l.line);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toContain(
        'File is still locked after 3 attempts, leaving it for the next scan {"fileName":"held.xml","code":"LOCK_ERROR","attempts":3}',
      );
      expect(c.getMetrics()).toMatchObject({ successCount: 0, errorCount: 0 });

      expect(await c.scan('poll')).toBe(1);
      await c.whenIdle();

      expect(outcomes.map((o) => o.status)).toEqual(['abandoned', 'success']);
      expect(await ws.list(ws.input)).toEqual([]);
    });

    it('should proceed once the lock is released between attempts', async () => {
      const c = create();
      await drop('INV2001.xml', VALID_INVOICE);
      probe.lockedProbes.set('INV2001.xml', 1);

      const outcome = await c.processFile(join(ws.input, 'INV2001.xml'));

      expect(outcome.status).toBe('success');
      expect(sleeps).toEqual([100]);
    });
  });

  describe('notifications', () => {
    it('should not let a failing notifier change the outcome', async () => {
      const c = create(
        {},
        {
          notifier: {
            onFileSucceeded: () => {
              throw new Error('SMTP unavailable');
            },
          },
        },
      );
      await drop('INV2001.xml', VALID_INVOICE);

      const outcome = await c.processFile(join(ws.input, 'INV2001.xml'));
      await c.whenIdle();

      expect(outcome.status).toBe('success');
      expect(c.getMetrics().successCount).toBe(1);
      expect(lines.some((l) => l.level === 'warn' && l.line.includes('Notifier failed'))).toBe(true);
    });
  });

  describe('daily summary', () => {
    const summaryConfig: ProcessorConfigOverrides = {
      notifications: { enabled: true, dailySummary: true, dailySummaryTime: '17:00' },
    };

    it('should publish once the time has passed and reset the counters', async () => {
      const c = create(summaryConfig);
      await drop('good.xml', VALID_INVOICE);
      await drop('bad.xml', WRONG_ROOT);
      await c.processFile(join(ws.input, 'good.xml'));
      await c.processFile(join(ws.input, 'bad.xml'));

      expect(c.checkDailySummary(new Date(2024, 0, 15, 16, 59, 0))).toBeNull();

      const summaryAt = new Date(2024, 0, 15, 17, 0, 30);
      const event = c.checkDailySummary(summaryAt);

      expect(event).toEqual({
        type: 'daily-summary',
        timestamp: summaryAt.toISOString(),
        periodStart: new Date(2024, 0, 15, 9, 30, 0).toISOString(),
        periodEnd: summaryAt.toISOString(),
        successCount: 1,
        errorCount: 1,
        errors: [
          {
            timestamp: new Date(2024, 0, 15, 9, 30, 0).toISOString(),
            fileName: 'bad.xml',
            message: "Unexpected root element 'PurchaseOrder'. Expected 'SalesInvoicePrint'.",
          },
        ],
      });
      expect(c.getMetrics()).toEqual({
        successCount: 0,
        errorCount: 0,
        since: summaryAt.toISOString(),
        errors: [],
      });

      await c.whenIdle();
      expect(notifier.events.map((e) => e.type)).toEqual(['file-succeeded', 'file-failed', 'daily-summary']);
    });

    it('should fire once per day', async () => {
      const c = create(summaryConfig);
      await drop('good.xml', VALID_INVOICE);
      await c.processFile(join(ws.input, 'good.xml'));

      expect(c.checkDailySummary(new Date(2024, 0, 15, 17, 0, 0))).not.toBeNull();

      await drop('next.xml', VALID_INVOICE);
      await c.processFile(join(ws.input, 'next.xml'));

      expect(c.checkDailySummary(new Date(2024, 0, 15, 17, 1, 0))).toBeNull();
      expect(c.checkDailySummary(new Date(2024, 0, 16, 17, 0, 0))).toMatchObject({ successCount: 1 });
    });

    it('should skip the summary when nothing happened', async () => {
      const c = create(summaryConfig);

      expect(c.checkDailySummary(new Date(2024, 0, 15, 17, 0, 0))).toBeNull();
      await c.whenIdle();
      expect(notifier.events).toEqual([]);
    });

    it('should never publish when notifications are disabled', async () => {
      const c = create({ notifications: { enabled: false } });
      await drop('good.xml', VALID_INVOICE);
      await c.processFile(join(ws.input, 'good.xml'));

      expect(c.checkDailySummary(new Date(2024, 0, 16, 9, 0, 0))).toBeNull();
      expect(c.getMetrics().successCount).toBe(1);
    });

    it('should flush a final summary on stop when asked', async () => {
      const c = create();
      await drop('good.xml', VALID_INVOICE);
      await c.processFile(join(ws.input, 'good.xml'));

      clock.set(new Date(2024, 0, 15, 12, 0, 0));
      await c.stop({ flushSummary: true });

      expect(notifier.events.map((e) => e.type)).toEqual(['file-succeeded', 'daily-summary']);
      expect(notifier.events[1]).toMatchObject({ successCount: 1, errorCount: 0 });
    });
  });

  describe('start and stop', () => {
    it('should process the backlog, then files dropped while running', async () => {
      const c = create({ pollIntervalSeconds: 1 });
      await drop('backlog.xml', VALID_INVOICE);

      await c.start();
      expect(c.running).toBe(true);
      await c.whenIdle();
      expect(await ws.list(ws.output)).toEqual(['backlog_Transformed_20240115_093000.xml']);

      const live = deferred<FileOutcome>();
      const seen = outcomes.length;
      const waitForLive = setInterval(() => {
        const processed = outcomes.slice(seen).find((o) => o.fileName === 'live.xml' && o.status !== 'vanished');
        if (processed) live.resolve(processed);
      }, 10);
      try {
        await drop('live.xml', VALID_INVOICE);
        expect(await live.promise).toMatchObject({ status: 'success', fileName: 'live.xml' });
      } finally {
        clearInterval(waitForLive);
      }

      await c.stop();
      expect(c.running).toBe(false);
      expect(await ws.list(ws.archive)).toEqual([
        'backlog_20240115_093000.xml',
        'live_20240115_093000.xml',
      ]);
    }, 10_000);

    it('should remove stale partial outputs on start', async () => {
      await mkdir(ws.output, { recursive: true });
      await writeFile(join(ws.output, '.old_Transformed_20240101_000000.xml.tmp'), 'partial', 'utf8');
      const c = create();

      await c.start();
      await c.stop();

      expect(await ws.list(ws.output)).toEqual([]);
      expect(await ws.list(ws.error)).toEqual([]);
    });

    it('should reject processFile after stop', async () => {
      const c = create();
      await c.stop();

      await expect(c.processFile(join(ws.input, 'late.xml'))).rejects.toThrow(/coordinator is stopping/);
    });
  });
});
