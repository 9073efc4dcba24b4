import { Injectable } from '@nestjs/common';
import { SchemaService } from '../schema/schema.service';
import { SeedService } from '../seed/seed.service';
import { IntegrityService } from '../integrity/integrity.service';
import { WinstonLogger } from '../common/winston.logger';
import { DatabaseCommand } from './cli.commands';

@Injectable()
export class CliService {
  private readonly logger = new WinstonLogger(CliService.name);

  constructor(
    private readonly schemaService: SchemaService,
    private readonly seedService: SeedService,
    private readonly integrityService: IntegrityService,
  ) {}

  /** Runs one command and resolves to the process exit code. */
  async run(command: DatabaseCommand): Promise<number> {
    switch (command) {
      case 'migrate':
        await this.schemaService.migrate();
        return 0;
      case 'revert':
        await this.schemaService.revert();
        return 0;
      case 'status': {
        const pending = await this.schemaService.hasPendingMigrations();
        this.logger.log(pending ? '⏳ Pending migrations found' : 'ℹ️ No pending migrations');
        return 0;
      }
      case 'reset':
        await this.schemaService.reset();
        await this.seedService.run();
        return 0;
      case 'seed':
        await this.seedService.run();
        return 0;
      case 'verify':
        return this.verify();
    }
  }

  private async verify(): Promise<number> {
    const report = await this.integrityService.audit();
    const { counts } = report;
    this.logger.log(
      `📊 categories=${counts.categories} products=${counts.products} orders=${counts.orders} order_items=${counts.order_items}`,
    );
    report.violations.forEach((issue) => this.logger.error(`[${issue.check}] ${issue.message}`));
    report.warnings.forEach((issue) => this.logger.warn(`[${issue.check}] ${issue.message}`));
    return report.ok ? 0 : 1;
  }
}
