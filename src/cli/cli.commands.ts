export const CLI_COMMANDS = ['migrate', 'revert', 'status', 'reset', 'seed', 'verify', 'script'] as const;

export type CliCommand = (typeof CLI_COMMANDS)[number];

/** Commands that need a database connection. */
export type DatabaseCommand = Exclude<CliCommand, 'script'>;

export const USAGE = `Usage: supermarket-db <command>

  migrate   apply pending migrations
  revert    undo the last migration
  status    report whether migrations are pending
  reset     drop the tables, migrate from scratch and seed
  seed      load the fixture rows into an empty schema
  verify    audit the stored data, exit 1 on violations
  script    print the MySQL import script (no connection needed)`;

function isCliCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some((command) => command === value);
}

export function parseCommand(argv: string[]): CliCommand {
  const [name] = argv;
  if (!name || !isCliCommand(name)) {
    throw new Error(name ? `Unknown command "${name}"\n\n${USAGE}` : USAGE);
  }
  return name;
}
