import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { appendFile, mkdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { toJson } from '../common/json';
import { RecorderFormat } from '../config/environment';
import {
  FLATTENED_STATISTICS_KEYS,
  FlattenedStatistics,
} from '../docsis';
import { ModemService } from '../modem/modem.service';

/**
 * Outcome of one recording pass, one entry per output file written or failed.
 */
export interface RecordingResult {
  written: string[];
  failed: Array<{ file: string; error: string }>;
}

export function escapeCsvValue(value: string | number | bigint): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvLine(values: Array<string | number | bigint>): string {
  return `${values.map(escapeCsvValue).join(',')}\n`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * RecorderService - Periodic poll loop
 *
 * CSV: one flattened row per poll in `<address>.csv`.
 * JSONL: system info, link status and DOCSIS statistics each appended to
 * their own `<address>_<kind>.jsonl` file.
 *
 * A failing target is logged and skipped. The next poll is scheduled once
 * the previous one has finished.
 */
@Injectable()
export class RecorderService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(RecorderService.name);

  private readonly formats: RecorderFormat[];
  private readonly outputDir: string;
  private readonly intervalMs: number;

  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly modemService: ModemService,
    private readonly configService: ConfigService,
  ) {
    this.formats = this.configService.get<RecorderFormat[]>(
      'RECORDER_FORMATS',
      [],
    );
    this.outputDir = this.configService.get<string>(
      'RECORDER_OUTPUT_DIR',
      'data',
    );
    this.intervalMs =
      this.configService.get<number>('RECORDER_INTERVAL_SECONDS', 60) * 1000;
  }

  get isRunning(): boolean {
    return this.running;
  }

  onApplicationBootstrap(): void {
    if (this.formats.length === 0) {
      this.logger.warn('No RECORDER_FORMATS configured, recorder is idle');
      return;
    }
    this.logger.log(
      `Recording ${this.formats.join(', ')} to ${this.outputDir} every ${this.intervalMs / 1000}s`,
    );
    this.running = true;
    this.schedule(0);
  }

  onModuleDestroy(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Poll the modem once and append to every configured target.
   */
  async recordOnce(): Promise<RecordingResult> {
    await mkdir(this.outputDir, { recursive: true });

    const targets: Array<{ file: string; write: () => Promise<void> }> = [];
    const address = this.modemService.address;

    if (this.formats.includes('csv')) {
      const file = path.join(this.outputDir, `${address}.csv`);
      targets.push({ file, write: () => this.appendCsvRow(file) });
    }
    if (this.formats.includes('jsonl')) {
      const systemInfoFile = this.jsonlFile(address, 'system_info');
      const linkStatusFile = this.jsonlFile(address, 'link_status');
      const statisticsFile = this.jsonlFile(address, 'docsis_statistics');
      targets.push(
        {
          file: systemInfoFile,
          write: async () =>
            this.appendJsonLine(
              systemInfoFile,
              await this.modemService.getSystemInfo(),
            ),
        },
        {
          file: linkStatusFile,
          write: async () =>
            this.appendJsonLine(
              linkStatusFile,
              await this.modemService.getLinkStatus(),
            ),
        },
        {
          file: statisticsFile,
          write: async () =>
            this.appendJsonLine(
              statisticsFile,
              await this.modemService.getDocsisStatistics(),
            ),
        },
      );
    }

    const outcomes = await Promise.allSettled(
      targets.map((target) => target.write()),
    );

    const result: RecordingResult = { written: [], failed: [] };
    outcomes.forEach((outcome, index) => {
      const { file } = targets[index];
      if (outcome.status === 'fulfilled') {
        result.written.push(file);
        return;
      }
      const reason: unknown = outcome.reason;
      const error = reason instanceof Error ? reason.message : String(reason);
      this.logger.error(`Failed to record ${file}: ${error}`);
      result.failed.push({ file, error });
    });

    this.logger.debug(
      `Recorded ${result.written.length} of ${targets.length} target(s)`,
    );
    return result;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.recordOnce()
        .catch((error: unknown) => {
          this.logger.error(
            `Recording pass failed: ${error instanceof Error ? error.message : String(error)}`,
          );
        })
        .finally(() => {
          if (this.running) {
            this.schedule(this.intervalMs);
          }
        });
    }, delayMs);
  }

  private jsonlFile(address: string, kind: string): string {
    return path.join(this.outputDir, `${address}_${kind}.jsonl`);
  }

  private async appendCsvRow(file: string): Promise<void> {
    const row: FlattenedStatistics =
      await this.modemService.getFlattenedStatistics();

    let content = '';
    if (await this.isEmpty(file)) {
      content += toCsvLine([...FLATTENED_STATISTICS_KEYS]);
    }
    content += toCsvLine(FLATTENED_STATISTICS_KEYS.map((key) => row[key]));
    await appendFile(file, content, 'utf8');
  }

  private async appendJsonLine(file: string, value: unknown): Promise<void> {
    await appendFile(file, `${toJson(value)}\n`, 'utf8');
  }

  private async isEmpty(file: string): Promise<boolean> {
    try {
      return (await stat(file)).size === 0;
    } catch (error) {
      if (isMissingFile(error)) {
        return true;
      }
      throw error;
    }
  }
}
