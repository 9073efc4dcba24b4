import { Module } from '@nestjs/common';
import { SchemaService } from './schema.service';
import { ImportScriptService } from './import-script.service';

@Module({
  providers: [SchemaService, ImportScriptService],
  exports: [SchemaService, ImportScriptService],
})
export class SchemaModule {}
