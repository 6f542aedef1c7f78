import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database/database.module';
import { LicensesModule } from './modules/licenses/licenses.module';
import { LogsModule } from './modules/logs/logs.module';
import { AppController } from './app.controller';
import { AppService } from './app.service';

@Module({
  imports: [
    // Configuration (loads .env before the store is chosen below)
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),

    // License storage: TypeORM or the in-memory fallback
    DatabaseModule.forRoot(),

    // Feature modules
    LicensesModule,
    LogsModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
