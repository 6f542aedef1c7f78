import { IsString, IsNotEmpty, IsInt, Min, Max, MaxLength, ValidateIf } from 'class-validator';
import { Type } from 'class-transformer';
import { Trim } from './trim.transform';
import { MAX_ACTIVATIONS_LIMIT, MAX_VALIDITY_DAYS, isPresent } from './generate-license.dto';

export const MAX_BULK_COUNT = 1000;

export class GenerateBulkLicensesDto {
  @IsString()
  adminSecret!: string;

  @Trim()
  @IsString({ message: 'Customer name prefix is required' })
  @IsNotEmpty({ message: 'Customer name prefix is required' })
  @MaxLength(240, { message: 'Customer name prefix must be 240 characters or less' })
  customerNamePrefix!: string;

  @Type(() => Number)
  @IsInt({ message: 'Count must be a whole number' })
  @Min(1, { message: `Count must be between 1 and ${MAX_BULK_COUNT}` })
  @Max(MAX_BULK_COUNT, { message: `Count must be between 1 and ${MAX_BULK_COUNT}` })
  count!: number;

  @ValidateIf(isPresent)
  @Type(() => Number)
  @IsInt({ message: 'Validity days must be a whole number' })
  @Min(1, { message: `Validity days must be between 1 and ${MAX_VALIDITY_DAYS}` })
  @Max(MAX_VALIDITY_DAYS, { message: `Validity days must be between 1 and ${MAX_VALIDITY_DAYS}` })
  validityDays: number = 365;

  @ValidateIf(isPresent)
  @Type(() => Number)
  @IsInt({ message: 'Max activations must be a whole number' })
  @Min(1, { message: `Max activations must be between 1 and ${MAX_ACTIVATIONS_LIMIT}` })
  @Max(MAX_ACTIVATIONS_LIMIT, {
    message: `Max activations must be between 1 and ${MAX_ACTIVATIONS_LIMIT}`,
  })
  maxActivations: number = 1;
}
