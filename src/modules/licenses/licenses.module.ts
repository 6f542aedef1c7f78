import { Module } from '@nestjs/common';
import { LicensesService } from './licenses.service';
import { LicenseValidationService } from './license-validation.service';
import { LicensesController } from './licenses.controller';
import { LicenseKeyGenerator } from './license-key.generator';
import { AdminSecretService } from './admin-secret.service';
import { AdminSecretGuard } from './guards/admin-secret.guard';
import { LogsModule } from '../logs/logs.module';

@Module({
  imports: [LogsModule],
  controllers: [LicensesController],
  providers: [
    LicensesService,
    LicenseValidationService,
    LicenseKeyGenerator,
    AdminSecretService,
    AdminSecretGuard,
  ],
  exports: [LicensesService, LicenseValidationService],
})
export class LicensesModule {}
