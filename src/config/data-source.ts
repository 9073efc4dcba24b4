import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { buildTypeOrmConfig } from './typeorm.config';

// Used by the typeorm CLI, e.g. `typeorm migration:show -d dist/config/data-source.js`
export default new DataSource(buildTypeOrmConfig());
