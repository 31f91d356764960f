import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface RunLoggerOptions {
  runLabel?: string;
  /** Mirror each line to the console (stderr for warnings and errors). */
  echo?: boolean;
}

function nowIso(): string {
  return new Date().toISOString();
}

export class RunLogger {
  private readonly runLabel: string;
  private readonly echo: boolean;

  constructor(
    private readonly filePath: string,
    options: RunLoggerOptions = {},
  ) {
    this.runLabel = options.runLabel ?? 'Collections run';
    this.echo = options.echo ?? false;
  }

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, '', 'utf8');
    await this.write(`=== ${this.runLabel} started ${nowIso()} ===`);
  }

  async info(message: string): Promise<void> {
    await this.log('INFO', message);
  }

  async warn(message: string): Promise<void> {
    await this.log('WARN', message);
  }

  async error(message: string): Promise<void> {
    await this.log('ERROR', message);
  }

  async close(): Promise<void> {
    await this.write(`=== ${this.runLabel} finished ${nowIso()} ===`);
  }

  private async log(level: LogLevel, message: string): Promise<void> {
    if (this.echo) {
      if (level === 'INFO') {
        console.log(message);
      } else {
        console.error(`${level === 'WARN' ? 'Warning' : 'Error'}: ${message}`);
      }
    }
    await this.write(`[${level}] ${message}`);
  }

  private async write(message: string): Promise<void> {
    await appendFile(this.filePath, `${nowIso()} ${message}\n`, 'utf8');
  }
}
