/**
 * Markdown rendering of a comprehensive report.
 *
 * @packageDocumentation
 */

import type { TheoryId } from '../theory/types.js';
import type { ComprehensiveReport } from './report.js';

export interface FormatReportOptions {
  /** Display names by theory id; ids are shown when absent. */
  displayNames?: ReadonlyMap<TheoryId, string>;
}

function fixed(value: number): string {
  return value.toFixed(2);
}

function signed(value: number): string {
  return value >= 0 ? `+${fixed(value)}` : fixed(value);
}

/**
 * Renders the report as markdown. Sections without content are omitted.
 */
export function formatReport(report: ComprehensiveReport, options?: FormatReportOptions): string {
  const name = (id: TheoryId): string => options?.displayNames?.get(id) ?? id;
  const lines: string[] = [];

  lines.push(`# Reading: ${report.question}`);
  lines.push('');
  lines.push(`**Verdict:** ${report.verdict.summary}`);
  lines.push('');
  lines.push(`- Category: ${report.category}`);
  lines.push(
    `- Judgment: ${report.verdict.judgment} (level ${fixed(report.verdict.judgmentLevel)})`
  );
  lines.push(
    `- Confidence: ${fixed(report.initialResolution.confidence)} before verification, ${fixed(report.verdict.confidence)} after`
  );

  lines.push('');
  lines.push('## Readings');
  lines.push('');
  lines.push('| Theory | Judgment | Level | Confidence |');
  lines.push('|--------|----------|-------|------------|');
  for (const result of report.results) {
    lines.push(
      `| ${name(result.theoryId)} | ${result.judgment} | ${fixed(result.judgmentLevel)} | ${fixed(result.confidence)} |`
    );
  }

  if (report.droppedTheories.length > 0) {
    lines.push('');
    lines.push('## Dropped');
    lines.push('');
    for (const dropped of report.droppedTheories) {
      lines.push(`- ${name(dropped.theoryId)}: ${dropped.reason}`);
    }
  }

  const resolution = report.finalResolution;
  lines.push('');
  lines.push('## Resolution');
  lines.push('');
  lines.push(`Strategy: ${resolution.strategy} (tier ${String(resolution.tier)})`);
  if (resolution.arbitration !== undefined) {
    const { arbitratorId, pair, matchedSide } = resolution.arbitration;
    lines.push(
      `Arbitration: ${name(arbitratorId)} settled ${name(pair[0])} vs ${name(pair[1])} (matched: ${matchedSide})`
    );
  }

  if (report.verificationQuestions.length > 0) {
    lines.push('');
    lines.push('## Verification');
    lines.push('');
    report.verificationQuestions.forEach((question, index) => {
      const feedback = report.verificationFeedback.find((f) => f.questionId === question.id);
      const adjustment = report.adjustments.find((a) => a.questionId === question.id);
      const outcome =
        feedback === undefined
          ? 'unanswered'
          : adjustment === undefined
            ? feedback.outcome
            : `${feedback.outcome} (${name(adjustment.theoryId)} ${signed(adjustment.delta)})`;
      lines.push(`${String(index + 1)}. ${question.prompt} - ${outcome}`);
    });
  }

  if (report.skippedFields.length > 0) {
    lines.push('');
    lines.push(`Skipped: ${report.skippedFields.join(', ')}`);
  }

  lines.push('');
  lines.push(`_Generated ${report.generatedAt}_`);
  return lines.join('\n');
}
