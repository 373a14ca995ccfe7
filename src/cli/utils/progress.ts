/**
 * Progress Reporter
 *
 * Manages progress display for `ragent index`.
 * Supports multiple output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for CI/CD integration
 * - Text: Simple text output for non-TTY environments
 *
 * Spinner updates are throttled (100ms minimum) to prevent flickering.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { IndexingStage, IndexPipelineResult, StageStats } from '../../indexer/types.js';

export type { IndexingStage, IndexPipelineResult, StageStats };

/**
 * Human-readable labels for each stage.
 */
const STAGE_LABELS: Record<IndexingStage, string> = {
  reading: 'Reading',
  embedding: 'Embedding',
  saving: 'Saving',
};

const STAGE_ORDER: readonly IndexingStage[] = ['reading', 'embedding', 'saving'];

const STAGE_UNITS: Record<IndexingStage, string> = {
  reading: 'chunks read',
  embedding: 'chunks embedded',
  saving: 'chunks saved',
};

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show the per-stage time breakdown in the summary */
  verbose: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * JSON event types for NDJSON output.
 */
export type ProgressEventType = 'stage_start' | 'stage_progress' | 'stage_complete' | 'error' | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IndexingStage;
  data: Record<string, unknown>;
}

/**
 * Format milliseconds as human-readable duration.
 *
 * @example
 * formatDuration(850)    // "850ms"
 * formatDuration(12_300) // "12.3s"
 * formatDuration(95_000) // "1m 35s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

export class ProgressReporter {
  private readonly options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: IndexingStage | null = null;
  private currentTotal = 0;
  private lastUpdateTime = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(options: ProgressReporterOptions) {
    this.options = options;
  }

  /**
   * Start a new stage of the indexing pipeline.
   *
   * @param total - Expected total items (0 if unknown, like while reading)
   */
  startStage(stage: IndexingStage, total: number = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.lastUpdateTime = 0;

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', timestamp: new Date().toISOString(), stage, data: { total } });
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(10)),
      }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  /**
   * Update progress within the current stage.
   */
  updateProgress(processed: number): void {
    if (!this.currentStage) return;

    const now = performance.now();
    if (this.lastUpdateTime > 0 && now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage: this.currentStage,
        data: { processed, total: this.currentTotal },
      });
      return;
    }

    if (this.spinner && this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      this.spinner.text = `${processed}/${this.currentTotal} (${percentage}%)`;
    }
  }

  /**
   * Mark the current stage as complete.
   */
  completeStage(stats: StageStats): void {
    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage: stats.stage,
        data: {
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
          details: stats.details,
        },
      });
    } else if (this.spinner) {
      this.spinner.succeed(`${stats.processed.toLocaleString()} ${STAGE_UNITS[stats.stage]}`);
    } else {
      console.log(
        `${STAGE_LABELS[stats.stage]} complete: ${stats.processed.toLocaleString()} ${STAGE_UNITS[stats.stage]}`
      );
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Stop an in-progress stage after a fatal error.
   */
  fail(message: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'error',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message },
      });
    } else {
      this.spinner?.fail(message);
    }
    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Display the final summary after indexing completes.
   */
  showSummary(result: IndexPipelineResult): void {
    if (this.options.json) {
      this.emitJson({ type: 'complete', timestamp: new Date().toISOString(), data: { result } });
      return;
    }

    console.log('');
    console.log(chalk.green.bold('Index Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Chunks added:')}     ${result.chunksRead.toLocaleString()}`);
    if (result.chunksPrecomputed > 0) {
      console.log(`  ${chalk.dim('Precomputed:')}      ${result.chunksPrecomputed.toLocaleString()}`);
    }
    console.log(`  ${chalk.dim('Index size:')}       ${result.totalChunks.toLocaleString()} chunks`);
    console.log(`  ${chalk.dim('Model:')}            ${result.model}`);
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(result.totalDurationMs)}`);
    console.log(`  ${chalk.dim('Saved to:')}         ${result.indexPath}`);

    if (this.options.verbose) {
      console.log('');
      console.log(chalk.dim('  Breakdown:'));
      for (const stage of STAGE_ORDER) {
        const durationMs = result.stageDurations[stage];
        if (durationMs !== undefined) {
          const label = `${STAGE_LABELS[stage]}:`;
          console.log(`    ${chalk.dim(label.padEnd(12))}${formatDuration(durationMs)}`);
        }
      }
    }

    console.log('');
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(options: Partial<ProgressReporterOptions> = {}): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
