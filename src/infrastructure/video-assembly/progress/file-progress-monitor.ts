import { type FileHandle, mkdtemp, open, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { ProgressCallback, ProgressMonitor } from '@domain/video-assembly/index.js';

import { createChildLogger } from '@/shared/logger/pino.js';

import { parseProgressLines } from './progress-parser.js';

type MonitorState = 'idle' | 'running' | 'stopped';

interface FileProgressMonitorOptions {
  readonly intervalMs?: number;
  readonly tempRoot?: string;
}

const DEFAULT_INTERVAL_MS = 1_000;

/**
 * Polls a file the encoder appends progress blocks to and reports
 * `elapsed / expected` through the callback. Values may exceed 1 near the end.
 */
export class FileProgressMonitor implements ProgressMonitor {
  private readonly logger = createChildLogger({ module: 'FileProgressMonitor' });

  private readonly intervalMs: number;

  private readonly tempRoot: string;

  private state: MonitorState = 'idle';

  private directory: string | null = null;

  private filePath: string | null = null;

  private handle: FileHandle | null = null;

  private offset = 0;

  private pendingLine = '';

  private timer: NodeJS.Timeout | null = null;

  private inFlight: Promise<void> | null = null;

  private ended = false;

  public constructor(
    private readonly expectedDurationSeconds: number,
    private readonly onProgress: ProgressCallback,
    options: FileProgressMonitorOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.tempRoot = options.tempRoot ?? os.tmpdir();
  }

  public get channelPath(): string {
    if (this.filePath === null) {
      throw new Error('Progress channel is not open; start the monitor first');
    }
    return this.filePath;
  }

  public get status(): MonitorState {
    return this.state;
  }

  public async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`Progress monitor cannot start from state ${this.state}`);
    }
    this.state = 'running';

    try {
      this.directory = await mkdtemp(path.join(this.tempRoot, 'encode-progress-'));
      this.filePath = path.join(this.directory, 'progress.log');
      await writeFile(this.filePath, '');
      this.handle = await open(this.filePath, 'r');
    } catch (error) {
      this.state = 'stopped';
      await this.release();
      throw error;
    }

    if (this.status !== 'running') {
      await this.release();
      return;
    }

    this.schedule();
  }

  public async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }
    this.state = 'stopped';

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    await this.release();
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.poll().finally(() => {
        this.inFlight = null;
        // The encoder writes nothing after `progress=end`.
        if (this.state === 'running' && !this.ended) {
          this.schedule();
        }
      });
    }, this.intervalMs);
  }

  private async poll(): Promise<void> {
    try {
      const lines = await this.readAppendedLines();
      if (lines.length === 0) {
        return;
      }

      const parsed = parseProgressLines(lines);
      this.ended = this.ended || parsed.ended;

      if (!parsed.latest) {
        return;
      }

      if (this.expectedDurationSeconds > 0) {
        this.onProgress(parsed.latest.elapsedMicroseconds / 1_000_000 / this.expectedDurationSeconds);
      }
    } catch (error) {
      this.logger.warn({ error, channel: this.filePath }, 'Progress poll failed');
    }
  }

  private async readAppendedLines(): Promise<string[]> {
    const handle = this.handle;
    if (!handle) {
      return [];
    }

    const { size } = await handle.stat();
    if (size <= this.offset) {
      return [];
    }

    const buffer = Buffer.alloc(size - this.offset);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.offset);
    this.offset += bytesRead;

    const lines = (this.pendingLine + buffer.toString('utf8', 0, bytesRead)).split('\n');
    this.pendingLine = lines.pop() ?? '';
    return lines;
  }

  private async release(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }

    if (this.directory) {
      await rm(this.directory, { recursive: true, force: true });
      this.directory = null;
    }
  }
}
