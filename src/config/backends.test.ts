import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../utils/errors.js';
import { loadBackendTable, parseBackendTable } from './backends.js';

describe('backend capability table', () => {
  it('loads the bundled table', () => {
    const table = loadBackendTable();

    expect(table.defaultBackendId).toBe('openai');
    expect(table.backends.map((backend) => backend.id)).toEqual(['openai', 'anthropic', 'gemini']);
  });

  it('rejects duplicate ids', () => {
    const [first] = loadBackendTable().backends;
    expect(() => parseBackendTable({ defaultBackendId: first.id, backends: [first, first] })).toThrow(
      `Duplicate backend id "${first.id}"`
    );
  });

  it('rejects a default outside the table', () => {
    const { backends } = loadBackendTable();
    expect(() => parseBackendTable({ defaultBackendId: 'ghost', backends })).toThrow(
      'Default backend "ghost" is not in the capability table'
    );
  });

  it('rejects malformed entries', () => {
    expect(() =>
      parseBackendTable({ defaultBackendId: 'x', backends: [{ id: 'x', provider: 'mystery' }] })
    ).toThrow(ConfigurationError);
  });
});
