import { describe, it, expect } from 'vitest';
import { buildCli, parseMode, parseReportFormat } from '../cli/commands.js';
import { ModeError, ParameterError } from '../control-plane/errors.js';

describe('parseMode', () => {
  it('accepts every run mode case-insensitively', () => {
    expect(parseMode('full')).toBe('full');
    expect(parseMode('Backtest')).toBe('backtest');
  });

  it('rejects an unknown mode', () => {
    expect(() => parseMode('partial')).toThrow(ModeError);
  });
});

describe('parseReportFormat', () => {
  it('accepts json and md only', () => {
    expect(parseReportFormat('md')).toBe('md');
    expect(() => parseReportFormat('html')).toThrow(ParameterError);
  });
});

describe('buildCli', () => {
  it('registers the four commands', () => {
    expect(buildCli().commands.map((c) => c.name())).toEqual(['analyze', 'refresh', 'history', 'backtest']);
  });
});
