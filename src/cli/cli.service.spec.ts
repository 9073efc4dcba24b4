import { CliService } from './cli.service';
import { parseCommand, USAGE } from './cli.commands';
import { SchemaService } from '../schema/schema.service';
import { SeedService } from '../seed/seed.service';
import { IntegrityReport, IntegrityService } from '../integrity/integrity.service';

const cleanReport: IntegrityReport = {
  ok: true,
  counts: { categories: 4, products: 5, orders: 1, order_items: 2 },
  violations: [],
  warnings: [],
};

function createCli(report: IntegrityReport = cleanReport) {
  const calls: string[] = [];
  const schema = {
    migrate: jest.fn(async () => {
      calls.push('migrate');
      return [];
    }),
    revert: jest.fn(async () => {
      calls.push('revert');
    }),
    reset: jest.fn(async () => {
      calls.push('reset');
      return ['CreateSupermarketSchema1730419200000'];
    }),
    hasPendingMigrations: jest.fn(async () => false),
  };
  const seed = {
    run: jest.fn(async () => {
      calls.push('seed');
      return null;
    }),
  };
  const integrity = { audit: jest.fn(async () => report) };
  const cli = new CliService(
    schema as unknown as SchemaService,
    seed as unknown as SeedService,
    integrity as unknown as IntegrityService,
  );
  return { cli, calls };
}

describe('parseCommand', () => {
  it('accepts the known commands', () => {
    expect(parseCommand(['reset'])).toBe('reset');
    expect(parseCommand(['script', '--extra'])).toBe('script');
  });

  it('prints usage for anything else', () => {
    expect(() => parseCommand([])).toThrow(USAGE);
    expect(() => parseCommand(['drop'])).toThrow(`Unknown command "drop"\n\n${USAGE}`);
  });
});

describe('CliService', () => {
  it('resets the schema before seeding', async () => {
    const { cli, calls } = createCli();
    await expect(cli.run('reset')).resolves.toBe(0);
    expect(calls).toEqual(['reset', 'seed']);
  });

  it('runs single steps', async () => {
    const { cli, calls } = createCli();
    await cli.run('migrate');
    await cli.run('seed');
    await cli.run('revert');
    await expect(cli.run('status')).resolves.toBe(0);
    expect(calls).toEqual(['migrate', 'seed', 'revert']);
  });

  it('exits 0 on a clean audit', async () => {
    await expect(createCli().cli.run('verify')).resolves.toBe(0);
  });

  it('exits 1 when the audit finds violations', async () => {
    const { cli } = createCli({
      ...cleanReport,
      ok: false,
      violations: [{ check: 'product-category', message: 'product #9 references missing category "bakery"' }],
    });
    await expect(cli.run('verify')).resolves.toBe(1);
  });
});
