import { DynamicModule, Logger, Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { License } from './entities/license.entity';
import { Activation } from './entities/activation.entity';
import { ValidationLogEntry } from './entities/validation-log-entry.entity';
import { LICENSE_STORE } from './stores/license-store.interface';
import { TypeOrmLicenseStore } from './stores/typeorm-license.store';
import { InMemoryLicenseStore } from './stores/in-memory-license.store';
import { DemoLicenseSeeder } from './demo-license.seeder';
import { buildDemoLicenses } from './seeds/demo-licenses';
import { DatabaseConnection, resolveDatabaseConnection } from './database-connection';
import { StoragePolicy } from '../common/storage/storage-policy';

export const DATABASE_ENTITIES = [License, Activation, ValidationLogEntry];

export interface DatabaseModuleOptions {
  /**
   * Overrides the environment. `null` forces the in-memory fallback.
   */
  connection?: DatabaseConnection | null;
}

function buildTypeOrmOptions(
  connection: DatabaseConnection,
  configService: ConfigService,
): TypeOrmModuleOptions {
  const { options: policy } = StoragePolicy.fromConfig(configService);
  const common = {
    entities: DATABASE_ENTITIES,
    synchronize: true, // no migrations; schema follows the entities
    logging: false,
    retryAttempts: policy.retries,
    retryDelay: policy.backoffMs,
  };

  if (connection.type === 'postgres') {
    // PostgreSQL for production
    return {
      ...common,
      type: 'postgres',
      url: connection.url,
      ssl: connection.ssl ? { rejectUnauthorized: false } : false,
      connectTimeoutMS: policy.timeoutMs,
    };
  }

  // SQLite for development and tests
  return {
    ...common,
    type: 'sqlite',
    database: connection.database,
  };
}

/**
 * Chooses the license store once, at startup: TypeORM when a database is
 * configured, the in-memory demo catalog otherwise.
 */
@Module({})
export class DatabaseModule {
  private static readonly logger = new Logger(DatabaseModule.name);

  static async forRoot(options: DatabaseModuleOptions = {}): Promise<DynamicModule> {
    if (options.connection === undefined) {
      // .env reaches process.env through ConfigModule.forRoot
      await ConfigModule.envVariablesLoaded;
    }
    const connection =
      options.connection === undefined
        ? resolveDatabaseConnection(process.env)
        : options.connection;

    if (!connection) {
      DatabaseModule.logger.warn(
        '⚠️ No database configured. License server will run in IN-MEMORY MODE (limited functionality)',
      );
      return {
        module: DatabaseModule,
        global: true,
        providers: [
          {
            provide: LICENSE_STORE,
            useFactory: () => new InMemoryLicenseStore(buildDemoLicenses(new Date())),
          },
        ],
        exports: [LICENSE_STORE],
      };
    }

    DatabaseModule.logger.log(`📊 Using ${connection.type} license storage`);
    return {
      module: DatabaseModule,
      global: true,
      imports: [
        TypeOrmModule.forRootAsync({
          imports: [ConfigModule],
          useFactory: (configService: ConfigService) =>
            buildTypeOrmOptions(connection, configService),
          inject: [ConfigService],
        }),
        TypeOrmModule.forFeature(DATABASE_ENTITIES),
      ],
      providers: [
        {
          provide: StoragePolicy,
          useFactory: (configService: ConfigService) => StoragePolicy.fromConfig(configService),
          inject: [ConfigService],
        },
        TypeOrmLicenseStore,
        { provide: LICENSE_STORE, useExisting: TypeOrmLicenseStore },
        DemoLicenseSeeder,
      ],
      exports: [LICENSE_STORE, TypeOrmModule],
    };
  }
}
