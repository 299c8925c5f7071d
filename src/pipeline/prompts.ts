/**
 * Prompt templates for the map, reduce and chat stages.
 *
 * Templates use `{name}` placeholders filled by `fillTemplate`. Tier guidance
 * is data, so callers can swap the whole set without touching the pipeline.
 */

import type { ComplexityTier } from '../types.js';

export interface SummaryPrompts {
  /** Placeholders: {chunk}, {index}, {total} */
  map: string;
  /** Placeholders: {tier}, {guidance}, {partials} */
  reduce: string;
  tiers: Record<ComplexityTier, string>;
}

export const DEFAULT_SUMMARY_PROMPTS: SummaryPrompts = {
  map: [
    'You are analyzing an academic paper. Summarize the following CHUNK ({index} of {total}) in English.',
    'Focus on: problem statement, motivation, key ideas/methods, experiments, results, limitations.',
    'Keep it short and factual. Only use information present in the chunk.',
    '',
    'CHUNK:',
    '{chunk}',
  ].join('\n'),
  reduce: [
    'Synthesize a cohesive paper summary from these PARTIAL chunk summaries.',
    'The parts are in document order. Some parts may be marked as missing; do not speculate about them.',
    '',
    'Target complexity: {tier}',
    '{guidance}',
    '',
    'Structure with headings: <h2>TL;DR</h2>, <h2>Problem</h2>, <h2>Approach</h2>, <h2>Key Contributions</h2>, ' +
      '<h2>Results</h2>, <h2>Limitations</h2>, <h2>Notable Equations/Algorithms (if any)</h2>, <h2>Suggested Reading</h2>.',
    'Return ONLY clean HTML using <h2>, <p>, and <ul><li> for structure.',
    'Do not include any extraneous text outside HTML.',
    '',
    'PARTIALS:',
    '{partials}',
  ].join('\n'),
  tiers: {
    LOW: 'Write an accessible high-level overview for a general audience: plain language, short bullet points, no math.',
    MEDIUM:
      'Write a balanced technical summary: give the intuition first, then the key methods with a little math or CS detail where it helps.',
    HIGH: 'Write a dense technical summary for domain experts: precise terminology, methods, equations and quantitative results; assume familiarity with the field.',
  },
};

export const CHAT_INSTRUCTIONS = [
  'You are a helpful research assistant.',
  'Ground your answers ONLY in the provided paper text and the conversation so far. If you are uncertain, say you are unsure.',
  'Cite specific sections/ideas from the context when possible (no external links).',
  '',
  'Return ONLY valid HTML.',
  'Use <h2> for section titles, <p> for paragraphs, and <ul><li> for lists.',
  'For emphasis use <strong> and <em>; do not use Markdown, code fences, or any text outside HTML.',
].join('\n');

/**
 * Replace `{name}` placeholders. Unknown placeholders are left as they are.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? String(values[name]) : match
  );
}
