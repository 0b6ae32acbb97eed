/**
 * Formatter for run results.
 *
 * Renders a WorkflowResult as:
 * - Terminal summary with color-coded quality and step status
 * - Machine-readable JSON without the run's intermediate vectors
 */

import pc from 'picocolors';
import { displayGenre } from '../types/request.js';
import type { WorkflowResult } from '../types/workflow.js';
import { DIMENSION_LABELS } from '../quality/quality-feedback.js';
import { QUALITY_DIMENSIONS } from '../types/quality.js';

export interface ReportFormatOptions {
  /** Add per-dimension scores and optimization notes (default: false) */
  verbose?: boolean;
  /** Force color on or off (default: picocolors' TTY detection) */
  color?: boolean;
}

type Colors = ReturnType<typeof pc.createColors>;

const WIDTH = 60;

/**
 * Color-code a 0-10 score.
 * Green >= 8, yellow >= 6.5, red below.
 */
function colorScore(colors: Colors, score: number): string {
  const str = score.toFixed(1);
  if (score >= 8) return colors.green(str);
  if (score >= 6.5) return colors.yellow(str);
  return colors.red(str);
}

/**
 * Pad string to a minimum width (right-padded).
 */
function pad(str: string, width: number): string {
  // Strip ANSI codes for length calculation
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const diff = width - stripped.length;
  return diff > 0 ? str + ' '.repeat(diff) : str;
}

export function formatRunReport(result: WorkflowResult, options: ReportFormatOptions = {}): string {
  const { verbose = false } = options;
  const c = options.color === undefined ? pc : pc.createColors(options.color);
  const lines: string[] = [];
  const label = (name: string) => pad(`${name}:`, 11);

  lines.push('');
  lines.push(c.bold(result.title));
  lines.push('═'.repeat(WIDTH));

  const strategyLine = result.recommendation
    ? `${result.strategy} (confidence ${result.recommendation.confidence.toFixed(2)})`
    : result.strategy;
  lines.push(`${label('Genre')}${displayGenre(result.request)}`);
  lines.push(`${label('Strategy')}${strategyLine}`);
  lines.push(`${label('Words')}${result.wordCount} (target ${result.request.targetWordCount})`);

  if (result.quality) {
    const tier = result.feedback ? ` ${c.dim(result.feedback.tier)}` : '';
    lines.push(`${label('Quality')}${colorScore(c, result.quality.overall)}/10${tier}`);
  }
  if (result.enhancement) {
    const { passes, initialQuality, finalQuality, stopReason } = result.enhancement;
    lines.push(
      `${label('Passes')}${passes.length} (${stopReason}), ` +
        `${initialQuality.overall.toFixed(1)} -> ${finalQuality.overall.toFixed(1)}`,
    );
  }
  lines.push(`${label('Time')}${(result.totalTimeMs / 1000).toFixed(1)}s`);

  // Steps
  lines.push(c.dim('─'.repeat(WIDTH)));
  for (const step of result.steps) {
    const status = step.status === 'completed' ? c.green('ok') : c.red('FAILED');
    const retries = step.retries > 0 ? c.yellow(` ${step.retries} retr${step.retries === 1 ? 'y' : 'ies'}`) : '';
    lines.push(`${pad(step.name, 24)}${pad(status, 8)}${step.durationMs}ms${retries}`);
  }

  if (result.feedback) {
    const { strengths, areasForImprovement } = result.feedback;
    if (strengths.length > 0) {
      lines.push(c.dim('─'.repeat(WIDTH)));
      lines.push(c.bold('Strengths'));
      for (const s of strengths) lines.push(`  ${c.green('+')} ${s}`);
    }
    if (areasForImprovement.length > 0) {
      lines.push(c.bold('Needs work'));
      for (const a of areasForImprovement) lines.push(`  ${c.red('-')} ${a}`);
    }
  }

  if (verbose) {
    if (result.quality) {
      lines.push(c.dim('─'.repeat(WIDTH)));
      for (const dimension of QUALITY_DIMENSIONS) {
        const score = result.quality.dimensions[dimension];
        lines.push(`${pad(DIMENSION_LABELS[dimension], 24)}${colorScore(c, score)}`);
      }
    }
    for (const note of result.insights?.optimizationOpportunities ?? []) {
      lines.push(`  ${c.dim('└')} ${c.dim(note)}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * JSON summary of a run: final text, scores, pass summaries and step
 * statistics.
 */
export function formatRunReportJson(result: WorkflowResult): string {
  return JSON.stringify(
    {
      runId: result.runId,
      title: result.title,
      content: result.content,
      wordCount: result.wordCount,
      strategy: result.strategy,
      request: result.request,
      quality: result.quality
        ? { overall: result.quality.overall, dimensions: result.quality.dimensions }
        : null,
      enhancement: result.enhancement
        ? {
            stopReason: result.enhancement.stopReason,
            targetAchieved: result.enhancement.targetAchieved,
            convergence: result.enhancement.convergence,
            passes: result.enhancement.passes.map((p) => ({
              passNumber: p.passNumber,
              strategy: p.strategy,
              before: p.before.overall,
              after: p.after.overall,
              delta: p.delta,
              elapsedMs: p.elapsedMs,
              tokenCost: p.tokenCost,
            })),
          }
        : null,
      feedback: result.feedback ?? null,
      insights: result.insights ?? null,
      steps: result.steps,
      errorCount: result.run.errorCount,
      totalTimeMs: result.totalTimeMs,
    },
    null,
    2,
  );
}
