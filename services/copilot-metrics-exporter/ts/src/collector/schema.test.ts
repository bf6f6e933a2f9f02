import { describe, it, expect } from 'vitest';
import { decodeUsageResponse } from './schema';

describe('decodeUsageResponse', () => {
  it('fills absent sections, lists and counters with zero values', () => {
    const result = decodeUsageResponse([
      {
        day: '2024-01-01',
        total_suggestions_count: 100,
        total_acceptances_count: 80,
      },
    ]);

    expect(result.success).toBe(true);
    if (!result.success) return;
    const [record] = result.records;
    expect(record.total_lines_suggested).toBe(0);
    expect(record.total_active_chat_users).toBe(0);
    expect(record.breakdown).toEqual([]);
    expect(record.copilot_ide_code_completions).toEqual({
      total_engaged_users: 0,
      languages: [],
      editors: [],
      models: [],
    });
    expect(record.copilot_dotcom_pull_requests).toEqual({
      total_engaged_users: 0,
      repositories: [],
      models: [],
    });
  });

  it('decodes nested feature sections and repositories', () => {
    const result = decodeUsageResponse([
      {
        day: '2024-01-02',
        copilot_ide_chat: {
          total_engaged_users: 5,
          editors: [{ editor: 'vscode', chat_turns: 12 }],
        },
        copilot_dotcom_pull_requests: {
          total_engaged_users: 2,
          repositories: [
            {
              name: 'octo/widgets',
              total_engaged_users: 2,
              models: [{ model: 'default', suggestions_count: 4 }],
            },
          ],
        },
      },
    ]);

    expect(result.success).toBe(true);
    if (!result.success) return;
    const [record] = result.records;
    expect(record.copilot_ide_chat.editors).toEqual([
      {
        language: '',
        editor: 'vscode',
        model: '',
        suggestions_count: 0,
        acceptances_count: 0,
        lines_suggested: 0,
        lines_accepted: 0,
        active_users: 0,
        chat_acceptances: 0,
        chat_turns: 12,
        active_chat_users: 0,
      },
    ]);
    expect(record.copilot_dotcom_pull_requests.repositories[0].name).toBe('octo/widgets');
    expect(record.copilot_dotcom_pull_requests.repositories[0].models[0].suggestions_count).toBe(4);
  });

  it('treats null values as absent', () => {
    const result = decodeUsageResponse([
      { day: '2024-01-03', total_chat_turns: null, breakdown: null, copilot_dotcom_chat: null },
    ]);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.records[0].total_chat_turns).toBe(0);
    expect(result.records[0].breakdown).toEqual([]);
    expect(result.records[0].copilot_dotcom_chat).toEqual({ total_engaged_users: 0, models: [] });
  });

  it('decodes a null document as no records', () => {
    expect(decodeUsageResponse(null)).toEqual({ success: true, records: [] });
  });

  it('ignores unknown fields', () => {
    const result = decodeUsageResponse([{ day: '2024-01-04', total_code_reviews: 7 }]);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.records[0]).not.toHaveProperty('total_code_reviews');
  });

  it('rejects a non-array document', () => {
    const result = decodeUsageResponse({ message: 'Not Found' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toEqual(['<root>: Expected array, received object']);
  });

  it('rejects mistyped counters and dimensions', () => {
    const result = decodeUsageResponse([
      { day: '2024-01-05', total_suggestions_count: 'many', breakdown: [{ language: 42 }] },
    ]);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toEqual([
      '0.total_suggestions_count: Expected number, received string',
      '0.breakdown.0.language: Expected string, received number',
    ]);
  });

  it('rejects fractional counters', () => {
    const result = decodeUsageResponse([{ day: '2024-01-06', total_active_users: 1.5 }]);
    expect(result.success).toBe(false);
  });
});
