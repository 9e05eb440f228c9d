// packages/cli/src/examples/document-pipeline.ts — Parallel analysis feeding a sequential publish step

import { Workflow, logic, parallel, sequential, task } from '@taskloom/core';
import { asNumber, asString, asStringList } from './values.js';
import type { ExampleOptions, ExampleWorkflow } from './types.js';

export interface DocumentPipelineOptions extends ExampleOptions {
  document?: string;
  /** Documents longer than this many words get an extra trim step. */
  maxWords?: number;
  keywordCount?: number;
}

export const SAMPLE_DOCUMENT =
  'Workflows compose small tasks into larger pipelines. Parallel groups analyze the same input at once, ' +
  'and sequential groups feed each result into the next task. Logic components inspect outputs and ' +
  'decide which tasks run next.';

const DEFAULT_MAX_WORDS = 200;
const DEFAULT_KEYWORD_COUNT = 3;
const MIN_KEYWORD_LENGTH = 5;

export function createDocumentPipeline(options: DocumentPipelineOptions = {}): Workflow {
  const {
    document = SAMPLE_DOCUMENT,
    maxWords = DEFAULT_MAX_WORDS,
    keywordCount = DEFAULT_KEYWORD_COUNT,
    ...wiring
  } = options;

  const workflow: Workflow = new Workflow({
    ...wiring,
    name: 'DocumentPipeline',
    description: 'Analyzes a document in parallel and publishes a summary',
    components: [
      task('Fetch', async () => ({ text: document.trim() }), { description: 'Load the document text' }),

      parallel(
        'Analyze',
        [
          task('WordCount', async (inputs) => ({ words: words(asString(inputs.text, 'text')).length }), {
            inputs: { text: '{Fetch.text}' },
          }),
          task('Headline', async (inputs) => ({ title: firstSentence(asString(inputs.text, 'text')) }), {
            inputs: { text: '{Fetch.text}' },
          }),
          task(
            'Keywords',
            async (inputs) => ({ keywords: keywords(asString(inputs.text, 'text'), keywordCount) }),
            { inputs: { text: '{Fetch.text}' } },
          ),
        ],
        'Independent measurements of the fetched text',
      ),

      logic(
        'LengthCheck',
        async () => {
          const count = asNumber(workflow.outputs['WordCount.words'], 'WordCount.words');
          if (count <= maxWords) return [];
          return [
            task(
              'Trim',
              async (inputs) => ({ text: words(asString(inputs.text, 'text')).slice(0, maxWords).join(' ') }),
              { inputs: { text: '{Fetch.text}' }, description: `Cut the text to ${maxWords} words` },
            ),
          ];
        },
        'Add a trim step for long documents',
      ),

      sequential(
        'Publish',
        [
          task(
            'Summarize',
            async (inputs) => {
              const title = asString(inputs.title, 'title');
              if (inputs.trimmed === undefined) {
                return { summary: `${title} (${asNumber(inputs.words, 'words')} words)` };
              }
              const kept = words(asString(inputs.trimmed, 'trimmed')).length;
              return { summary: `${title} (${kept} words, trimmed)` };
            },
            // Trim.text is only present when LengthCheck added the trim step
            { inputs: { title: '{Headline.title}', words: '{WordCount.words}', trimmed: '{Trim.text}' } },
          ),
          task(
            'Format',
            async (inputs) => ({
              markdown: `## ${asString(inputs.summary, 'summary')}\n\nKeywords: ${asStringList(inputs.keywords, 'keywords').join(', ')}`,
            }),
            { inputs: { summary: '{Summarize.summary}', keywords: '{Keywords.keywords}' } },
          ),
        ],
        'Build the published summary',
      ),
    ],
  });
  return workflow;
}

export function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function firstSentence(text: string): string {
  const end = text.search(/[.!?](\s|$)/);
  return end === -1 ? text : text.slice(0, end);
}

/** Most frequent words of at least five letters; ties go alphabetically. */
export function keywords(text: string, count: number): string[] {
  const frequency = new Map<string, number>();
  for (const word of words(text.toLowerCase())) {
    const clean = word.replace(/[^a-z]/g, '');
    if (clean.length < MIN_KEYWORD_LENGTH) continue;
    frequency.set(clean, (frequency.get(clean) ?? 0) + 1);
  }
  return [...frequency.entries()]
    .sort(([a, na], [b, nb]) => nb - na || a.localeCompare(b))
    .slice(0, count)
    .map(([word]) => word);
}

export const documentPipeline: ExampleWorkflow = {
  name: 'document-pipeline',
  description: 'Parallel analysis, a length check and a sequential publish step with output references',
  create: (options) => createDocumentPipeline(options),
};
