import {
  Controller,
  Get,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  Ip,
  Res,
  UseGuards,
  ServiceUnavailableException,
} from '@nestjs/common';
import { Response } from 'express';
import { LicensesService } from './licenses.service';
import { LicenseValidationService } from './license-validation.service';
import { ValidateLicenseDto } from './dto/validate-license.dto';
import { GenerateLicenseDto } from './dto/generate-license.dto';
import { GenerateBulkLicensesDto } from './dto/generate-bulk-licenses.dto';
import { DeactivateLicenseDto } from './dto/deactivate-license.dto';
import { AdminSecretGuard } from './guards/admin-secret.guard';
import { StorageUnavailableError } from '../../common/errors/storage.errors';

// HttpStatus has no 207 member
const MULTI_STATUS = 207;

@Controller('license')
export class LicensesController {
  constructor(
    private readonly licensesService: LicensesService,
    private readonly licenseValidationService: LicenseValidationService,
  ) {}

  /**
   * Validation failures are ordinary 200 responses with `isValid: false`;
   * only storage trouble turns into an error status.
   */
  @Post('validate')
  @HttpCode(HttpStatus.OK)
  async validate(@Body() validateLicenseDto: ValidateLicenseDto, @Ip() ip: string) {
    try {
      return await this.licenseValidationService.validate({
        ...validateLicenseDto,
        ipAddress: ip,
      });
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        throw new ServiceUnavailableException(
          'License validation unavailable - storage not reachable',
        );
      }
      throw error;
    }
  }

  @Post('generate')
  @UseGuards(AdminSecretGuard)
  @HttpCode(HttpStatus.OK)
  async generate(@Body() generateLicenseDto: GenerateLicenseDto) {
    return this.licensesService.generate(generateLicenseDto);
  }

  @Post('generate/bulk')
  @UseGuards(AdminSecretGuard)
  @HttpCode(HttpStatus.OK)
  async generateBulk(
    @Body() generateBulkLicensesDto: GenerateBulkLicensesDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    const result = await this.licensesService.generateBulk(generateBulkLicensesDto);
    if (!result.success) {
      res.status(MULTI_STATUS);
    }
    return result;
  }

  @Post('deactivate')
  @UseGuards(AdminSecretGuard)
  @HttpCode(HttpStatus.OK)
  async deactivate(@Body() deactivateLicenseDto: DeactivateLicenseDto) {
    const license = await this.licensesService.deactivate(deactivateLicenseDto.licenseKey);
    return {
      success: true,
      message: 'License deactivated successfully',
      licenseKey: license.license_key,
      isActive: license.is_active,
    };
  }

  @Get('health')
  async health() {
    return this.licensesService.getHealth();
  }
}
