import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'node:fs';
import { runForecastCommand } from './forecast.js';

vi.mock('node:fs');

describe('runForecastCommand', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(fs.existsSync).mockReturnValue(false);
  });

  it('forecasts a churn series', () => {
    const result = JSON.parse(runForecastCommand({ metric: 'churn', values: '100, 120,140,160' }));

    expect(result.metric).toBe('churn');
    expect(result.predictedValue).toBeCloseTo(180, 10);
    expect(result.confidence).toBe('high');
    expect(result.observations).toBe(4);
  });

  it('falls back on an empty series', () => {
    const result = JSON.parse(runForecastCommand({ metric: 'cycle_time', values: '' }));
    expect(result.predictedValue).toBe(24);
    expect(result.reason).toBe('Need at least 2 weekly observations (got 0)');
  });

  it('rejects an unknown metric', () => {
    expect(() => runForecastCommand({ metric: 'velocity', values: '1,2' })).toThrow(
      '--metric must be churn or cycle_time'
    );
  });

  it('rejects non-numeric values', () => {
    expect(() => runForecastCommand({ metric: 'churn', values: '1,two' })).toThrow(
      '--values must be comma-separated numbers'
    );
  });
});
