import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import { formatIssuePath, formatIssues, zodErrorToIssues } from '../types.ts';

describe('zodErrorToIssues', () => {
  test('maps each zod issue to a dotted path', () => {
    const schema = z.object({ nodes: z.array(z.object({ id: z.string() })) });
    const result = schema.safeParse({ nodes: [{ id: 'a' }, { id: 7 }] });
    expect(result.success).toBe(false);
    if (result.success) return;

    const issues = zodErrorToIssues(result.error, 'diagram.json');
    expect(issues).toEqual([{
      file: 'diagram.json',
      path: 'nodes.1.id',
      message: 'Expected string, received number',
      severity: 'error',
    }]);
  });
});

describe('formatIssues', () => {
  test('renders one line per issue', () => {
    expect(formatIssues([
      { file: 'palette.json', path: 'page.width', message: 'Required', severity: 'error' },
      { file: 'palette.json', path: 'root', message: 'Bad', severity: 'warning' },
    ])).toBe('palette.json: page.width: Required\npalette.json: root: Bad');
  });

  test('names the root when the path is empty', () => {
    expect(formatIssuePath([])).toBe('root');
  });
});
