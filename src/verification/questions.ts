/**
 * Verification question generation.
 *
 * Theories are visited round-robin in descending confidence. Each theory
 * offers its own retrospective claims first, then claims derived from the
 * polarity of its judgment.
 *
 * @packageDocumentation
 */

import { judgmentPolarity } from '../theory/judgment.js';
import type { QuestionCategory, RetrospectiveClaim, TheoryResult } from '../theory/types.js';
import type { VerificationQuestion } from './types.js';

export const VERIFICATION_QUESTION_COUNT = 3;

const AREA_NAMES: Readonly<Record<QuestionCategory, string>> = {
  career: 'your work',
  wealth: 'your finances',
  love: 'your love life',
  marriage: 'your marriage or partnership',
  health: 'your health',
  study: 'your studies',
  relationship: 'your relationships',
  timing: 'your plans',
  decision: 'the choices in front of you',
  personality: 'how you handle things',
  other: 'this part of your life',
};

const TREND_OPTIONS = ['difficult', 'mixed', 'steady', 'improving'] as const;

function yesNo(statement: string): RetrospectiveClaim {
  return { kind: 'yes-no', statement, expected: true };
}

function recentTrend(area: string, expected: (typeof TREND_OPTIONS)[number]): RetrospectiveClaim {
  return {
    kind: 'choice',
    statement: `How would you describe the last six months in ${area}?`,
    options: TREND_OPTIONS,
    expected,
  };
}

/**
 * Claims about the recent past consistent with a judgment's polarity.
 */
export function synthesizeClaims(
  result: TheoryResult,
  category: QuestionCategory
): RetrospectiveClaim[] {
  const area = AREA_NAMES[category];
  const polarity = judgmentPolarity(result.judgment);
  if (polarity > 0) {
    return [
      yesNo(`Over the past year, has ${area} been moving in your favour?`),
      recentTrend(area, 'improving'),
      yesNo(`Has someone offered you help or support with ${area} recently?`),
    ];
  }
  if (polarity < 0) {
    return [
      yesNo(`Over the past year, have you run into setbacks in ${area}?`),
      recentTrend(area, 'difficult'),
      yesNo(`Have plans around ${area} been delayed more than once lately?`),
    ];
  }
  return [
    yesNo(`Has ${area} been mostly unchanged over the past year?`),
    recentTrend(area, 'steady'),
    yesNo(`Have you been waiting for a clear sign before acting on ${area}?`),
  ];
}

/**
 * Text shown for a claim, with a hint of the expected answer form.
 */
export function renderPrompt(claim: RetrospectiveClaim): string {
  switch (claim.kind) {
    case 'yes-no':
      return `${claim.statement} (yes/no)`;
    case 'choice':
      return `${claim.statement} (${claim.options.join(' / ')})`;
    case 'year':
      return `${claim.statement} Which year was it?`;
    case 'free-text':
      return claim.statement;
  }
}

/**
 * Exactly {@link VERIFICATION_QUESTION_COUNT} questions over the given results.
 */
export function generateQuestions(
  results: readonly TheoryResult[],
  category: QuestionCategory
): VerificationQuestion[] {
  const queues = [...results]
    .map((result, index) => ({ result, index }))
    .sort((a, b) => b.result.confidence - a.result.confidence || a.index - b.index)
    .map(({ result }) => {
      const own = (result.retrospectiveClaims ?? []).map((claim) => ({ claim, synthesized: false }));
      const derived = synthesizeClaims(result, category).map((claim) => ({
        claim,
        synthesized: true,
      }));
      return { theoryId: result.theoryId, claims: [...own, ...derived] };
    });

  const questions: VerificationQuestion[] = [];
  for (let round = 0; questions.length < VERIFICATION_QUESTION_COUNT; round++) {
    let offered = false;
    for (const queue of queues) {
      const entry = queue.claims[round];
      if (entry === undefined || questions.length >= VERIFICATION_QUESTION_COUNT) {
        continue;
      }
      offered = true;
      questions.push({
        id: `q${String(questions.length + 1)}`,
        theoryId: queue.theoryId,
        claim: entry.claim,
        shape: entry.claim.kind,
        prompt: renderPrompt(entry.claim),
        synthesized: entry.synthesized,
      });
    }
    if (!offered) {
      break;
    }
  }
  return questions;
}
