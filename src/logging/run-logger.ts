import type { RunLogLevel, RunLogRow } from "../types.js";
import { boundPayload, DEFAULT_PAYLOAD_LIMITS, type PayloadLimits } from "./payload.js";

export interface RunLoggerStats {
  event_count: number;
  provider_event_count: number;
  warning_count: number;
  flush_error_count: number;
}

export type RunLogSink = (rows: RunLogRow[]) => Promise<void>;

export interface RunLoggerOptions {
  runId: string;
  flushBatchSize: number;
  sink: RunLogSink;
  consoleWrite?: (line: string) => void;
  now?: () => Date;
  payloadLimits?: Partial<PayloadLimits>;
}

export class RunLogger {
  private readonly runId: string;
  private readonly flushBatchSize: number;
  private readonly sink: RunLogSink;
  private readonly consoleWrite: (line: string) => void;
  private readonly now: () => Date;
  private readonly payloadLimits: PayloadLimits;

  private readonly buffer: RunLogRow[] = [];
  private nextSeq = 1;
  private flushChain: Promise<void> = Promise.resolve();
  private isFlushing = false;

  private readonly stats: RunLoggerStats = {
    event_count: 0,
    provider_event_count: 0,
    warning_count: 0,
    flush_error_count: 0,
  };

  constructor(options: RunLoggerOptions) {
    this.runId = options.runId;
    this.flushBatchSize = Math.max(1, options.flushBatchSize);
    this.sink = options.sink;
    this.consoleWrite = options.consoleWrite ?? ((line) => console.log(line));
    this.now = options.now ?? (() => new Date());
    this.payloadLimits = { ...DEFAULT_PAYLOAD_LIMITS, ...options.payloadLimits };
  }

  getStats(): RunLoggerStats {
    return { ...this.stats };
  }

  log(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): void {
    const row = this.createRow(level, stage, event, message, payload);
    this.writeLine(row);
    this.buffer.push(row);

    if (this.buffer.length >= this.flushBatchSize && !this.isFlushing) {
      this.scheduleFlush("threshold");
    }
  }

  debug(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("debug", stage, event, message, payload);
  }

  info(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("info", stage, event, message, payload);
  }

  warn(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("warn", stage, event, message, payload);
  }

  error(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("error", stage, event, message, payload);
  }

  async flush(reason = "manual"): Promise<void> {
    this.scheduleFlush(reason);
    await this.flushChain;

    while (this.buffer.length > 0) {
      this.scheduleFlush(`${reason}_drain`);
      await this.flushChain;
    }
  }

  private scheduleFlush(reason: string): void {
    this.flushChain = this.flushChain
      .then(async () => {
        await this.flushInternal(reason);
      })
      .catch((error: unknown) => {
        this.stats.flush_error_count += 1;
        this.consoleWrite(
          JSON.stringify({
            run_id: this.runId,
            level: "error",
            event: "sink.flush.crashed",
            message: error instanceof Error ? error.message : String(error),
          }),
        );
      });
  }

  private createRow(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): RunLogRow {
    const createdAt = this.now();

    this.stats.event_count += 1;
    if (event.startsWith("openai.") || event.startsWith("provider.")) {
      this.stats.provider_event_count += 1;
    }
    if (level === "warn") {
      this.stats.warning_count += 1;
    }

    return {
      runId: this.runId,
      seq: this.nextSeq++,
      level,
      stage,
      event,
      message,
      payload: boundPayload(payload, this.payloadLimits),
      timestamp: createdAt.toISOString(),
    };
  }

  private writeLine(row: RunLogRow): void {
    this.consoleWrite(
      JSON.stringify({
        timestamp: row.timestamp,
        run_id: row.runId,
        seq: row.seq,
        level: row.level,
        stage: row.stage,
        event: row.event,
        message: row.message,
        payload: row.payload,
      }),
    );
  }

  private async flushInternal(reason: string): Promise<void> {
    if (this.isFlushing || this.buffer.length === 0) {
      return;
    }

    this.isFlushing = true;
    const rows = this.buffer.splice(0, this.buffer.length);

    const startedRow = this.createRow(
      "debug",
      "logging",
      "sink.flush.started",
      "Flushing buffered run logs to the sink.",
      {
        reason,
        row_count: rows.length,
      },
    );
    this.writeLine(startedRow);

    try {
      await this.sink([startedRow, ...rows]);

      const completedRow = this.createRow(
        "debug",
        "logging",
        "sink.flush.completed",
        "Buffered run logs were flushed.",
        {
          reason,
          row_count: rows.length,
        },
      );
      this.writeLine(completedRow);
      await this.sink([completedRow]);
    } catch (error) {
      this.stats.flush_error_count += 1;

      const failedRow = this.createRow(
        "error",
        "logging",
        "sink.flush.failed",
        "Failed to flush buffered run logs; continuing execution.",
        {
          reason,
          row_count: rows.length,
          error_message: error instanceof Error ? error.message : "unknown_error",
        },
      );
      this.writeLine(failedRow);

      try {
        await this.sink([failedRow]);
      } catch (nestedError) {
        this.consoleWrite(
          JSON.stringify({
            run_id: this.runId,
            level: "error",
            event: "sink.flush.failed_row_lost",
            message: nestedError instanceof Error ? nestedError.message : String(nestedError),
          }),
        );
      }
    } finally {
      this.isFlushing = false;
      if (this.buffer.length >= this.flushBatchSize) {
        this.scheduleFlush("post_flush_threshold");
      }
    }
  }
}
