import { formatLogLine, getWinstonLogger, sanitizeLogName, toErrorMeta } from './winston.logger';

describe('winston logger', () => {
  it('formats lines as [time] [LEVEL] [service] message', () => {
    expect(
      formatLogLine('SeedService', { level: 'info', message: 'done', timestamp: '2025-11-01 08:00:01' }),
    ).toBe('[2025-11-01 08:00:01] [INFO] [SeedService] done');
  });

  it('appends stack and metadata', () => {
    expect(
      formatLogLine('CliService', {
        level: 'error',
        message: 'failed',
        timestamp: '2025-11-01 08:00:01',
        stack: 'Error: failed\n    at x',
        table: 'orders',
      }),
    ).toBe('[2025-11-01 08:00:01] [ERROR] [CliService] failed\nError: failed\n    at x\n{\n  "table": "orders"\n}');
  });

  it('prints an error trace as a stack, extra parameters as context', () => {
    const meta = toErrorMeta('Error: boom\n    at x', ['extra']);
    expect(meta).toEqual({ stack: 'Error: boom\n    at x', context: ['extra'] });
    expect(
      formatLogLine('CliService', { level: 'error', message: 'boom', timestamp: '2025-11-01 08:00:01', ...meta }),
    ).toBe('[2025-11-01 08:00:01] [ERROR] [CliService] boom\nError: boom\n    at x\n{\n  "context": [\n    "extra"\n  ]\n}');
  });

  it('adds nothing when there is no trace or extra parameter', () => {
    expect(toErrorMeta()).toEqual({});
    expect(toErrorMeta(undefined, [])).toEqual({});
  });

  it('makes service names file-system friendly', () => {
    expect(sanitizeLogName('Seed Service!')).toBe('seed-service-');
  });

  it('reuses one logger per service', () => {
    expect(getWinstonLogger('SchemaService')).toBe(getWinstonLogger('SchemaService'));
  });
});
