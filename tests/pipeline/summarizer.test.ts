/**
 * Querywise - Result Summarizer Tests
 */

import { describe, it, expect } from '@jest/globals';

import { PromptResolver } from '../../src/pipeline/prompts.js';
import {
  NO_RESULTS_SUMMARY,
  ResultSummarizer,
  SUMMARY_FALLBACK,
  describeRowCount,
  toMarkdownTable,
} from '../../src/pipeline/summarizer.js';
import { FixedClientFactory, ScriptedCompletionClient, TEST_CONTEXT } from '../helpers/fakes.js';

function createSummarizer(client: ScriptedCompletionClient, maxPreviewRows = 10) {
  return new ResultSummarizer({
    completions: new FixedClientFactory(client),
    prompts: new PromptResolver(),
    model: 'gpt-4o',
    maxPreviewRows,
  });
}

describe('toMarkdownTable', () => {
  it('should render a header, a separator and one line per row', () => {
    expect(
      toMarkdownTable([
        { id: 1, name: 'Ada' },
        { id: 2, name: null },
      ])
    ).toBe('| id | name |\n| --- | --- |\n| 1 | Ada |\n| 2 |  |\n');
  });

  it('should take the union of columns in first-seen order', () => {
    expect(toMarkdownTable([{ a: 1 }, { b: true }])).toBe(
      '| a | b |\n| --- | --- |\n| 1 |  |\n|  | true |\n'
    );
  });

  it('should wrap cells containing pipes and render objects as JSON', () => {
    expect(toMarkdownTable([{ note: 'a|b', tags: ['x'] }])).toBe(
      '| note | tags |\n| --- | --- |\n| `a|b` | ["x"] |\n'
    );
  });

  it('should be empty for no rows', () => {
    expect(toMarkdownTable([])).toBe('');
  });
});

describe('describeRowCount', () => {
  it('should mention the total when rows were cut', () => {
    expect(describeRowCount(10, 25)).toBe('Here are the top 10 results out of 25 total rows:');
    expect(describeRowCount(3, 3)).toBe('Here are all 3 results:');
  });
});

describe('ResultSummarizer', () => {
  it('should combine the model summary, the row count line and the preview', async () => {
    const client = new ScriptedCompletionClient([], ['  Two users are active.  ']);
    const rows = [{ name: 'Ada' }, { name: 'Grace' }];

    const summary = await createSummarizer(client).summarize(
      'who is active?',
      'SELECT name FROM users',
      rows,
      TEST_CONTEXT
    );

    expect(summary).toBe(
      'Two users are active.\n\nHere are all 2 results:\n\n| name |\n| --- |\n| Ada |\n| Grace |\n'
    );
  });

  it('should send the question, the query and at most ten rows to the model', async () => {
    const client = new ScriptedCompletionClient([], ['ok']);
    const rows = Array.from({ length: 12 }, (_, i) => ({ n: i }));

    await createSummarizer(client, 2).summarize('q?', 'SELECT n FROM t', rows, TEST_CONTEXT);

    const [request] = client.completionRequests;
    expect(request?.model).toBe('gpt-4o');
    expect(request?.messages[1]?.content).toBe(
      'Original question: q?\n' +
        'SQL query executed: SELECT n FROM t\n' +
        `Query results: ${JSON.stringify(rows.slice(0, 10), null, 2)}\n... and 2 more rows\n\n` +
        'Please summarize these results to answer the original question.'
    );
  });

  it('should preview only the configured number of rows', async () => {
    const client = new ScriptedCompletionClient([], ['Summary.']);
    const rows = [{ n: 1 }, { n: 2 }, { n: 3 }];

    const summary = await createSummarizer(client, 2).summarize('q', 'SELECT n', rows, TEST_CONTEXT);

    expect(summary).toBe(
      'Summary.\n\nHere are the top 2 results out of 3 total rows:\n\n| n |\n| --- |\n| 1 |\n| 2 |\n'
    );
  });

  it('should skip the model for no rows', async () => {
    const client = new ScriptedCompletionClient();
    await expect(createSummarizer(client).summarize('q', 'SELECT 1', [], TEST_CONTEXT)).resolves.toBe(
      NO_RESULTS_SUMMARY
    );
    expect(client.completionRequests).toHaveLength(0);
  });

  it('should return the fallback sentence when the model fails', async () => {
    const client = new ScriptedCompletionClient([], [new Error('upstream 500')]);
    await expect(
      createSummarizer(client).summarize('q', 'SELECT 1', [{ one: 1 }], TEST_CONTEXT)
    ).resolves.toBe(SUMMARY_FALLBACK);
  });
});
