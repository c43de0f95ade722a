// Test helpers for autoprint tests

import { vi } from 'vitest';
import type { INotifier, IPrintConfirmer, IPrintSpooler } from '../src/interfaces.js';
import type { Logger } from '../src/logger.js';
import type { AutoprintConfig, PrintJob, Rule } from '../src/types.js';
import { DEFAULT_TIMING } from '../src/types.js';
import type { Clock } from '../src/utils/timing.js';

/**
 * Create a mock logger
 */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
  };
}

/**
 * Clock whose sleep advances time instantly and records each duration
 */
export class FakeClock implements Clock {
  public readonly sleeps: number[] = [];

  constructor(public current = 0) {}

  now(): number {
    return this.current;
  }

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.current += ms;
  };

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface RecordedNotification {
  title: string;
  message: string;
  success: boolean;
}

export class RecordingNotifier implements INotifier {
  public readonly notifications: RecordedNotification[] = [];

  async notify(title: string, message: string, success: boolean): Promise<void> {
    this.notifications.push({ title, message, success });
  }

  get titles(): string[] {
    return this.notifications.map((notification) => notification.title);
  }
}

export class FixedConfirmer implements IPrintConfirmer {
  public readonly asked: string[] = [];

  constructor(private readonly answer: boolean) {}

  async confirm(filename: string): Promise<boolean> {
    this.asked.push(filename);
    return this.answer;
  }
}

/**
 * In-memory print subsystem. Records every call in order so tests can
 * assert the switch/submit/restore sequence.
 */
export class FakeSpooler implements IPrintSpooler {
  public readonly calls: string[] = [];
  public readonly submitted: string[] = [];
  public jobs: Record<string, PrintJob[]> = {};
  public failSubmit?: Error;
  public failEnumerate?: Error;
  /** Job lists served per enumeration round, after which `jobs` is used */
  public jobRounds: Array<Record<string, PrintJob[]>> = [];
  private currentRound: Record<string, PrintJob[]> = {};

  constructor(
    public defaultPrinter: string | undefined,
    public printers: string[] = []
  ) {}

  async getDefaultPrinter(): Promise<string | undefined> {
    this.calls.push('getDefault');
    return this.defaultPrinter;
  }

  async setDefaultPrinter(name: string): Promise<void> {
    this.calls.push(`setDefault:${name}`);
    this.defaultPrinter = name;
  }

  async submitPrint(filePath: string): Promise<void> {
    this.calls.push(`submit:${filePath}`);
    if (this.failSubmit) {
      throw this.failSubmit;
    }
    this.submitted.push(filePath);
  }

  async enumeratePrinters(): Promise<string[]> {
    if (this.failEnumerate) {
      throw this.failEnumerate;
    }
    this.currentRound = this.jobRounds.shift() ?? this.jobs;
    return this.printers;
  }

  async enumerateJobs(printer: string): Promise<PrintJob[]> {
    return this.currentRound[printer] ?? [];
  }
}

export function createRule(overrides: Partial<Rule> & { pattern: string }): Rule {
  return {
    regex: new RegExp(overrides.pattern),
    destination: '/archive',
    printMode: 'never',
    ...overrides,
  };
}

export function createTestConfig(overrides: Partial<AutoprintConfig> = {}): AutoprintConfig {
  return {
    watchDirectory: '/downloads',
    dedupeTtlSeconds: 30,
    language: 'en',
    rules: [],
    logging: { file: '/tmp/autoprint-test.log', level: 'info' },
    notifications: { enabled: false },
    timing: { ...DEFAULT_TIMING },
    ...overrides,
  };
}
