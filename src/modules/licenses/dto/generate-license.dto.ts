import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsEmail,
  IsInt,
  Min,
  Max,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { Type } from 'class-transformer';
import { Trim } from './trim.transform';

export const MAX_VALIDITY_DAYS = 3650;
export const MAX_ACTIVATIONS_LIMIT = 100;
export const MAX_CUSTOMER_NAME_LENGTH = 250;

/**
 * Skips validation only when the field is absent, so the class default
 * applies. An explicit null is still validated and rejected.
 */
export const isPresent = (_dto: object, value: unknown): boolean => value !== undefined;

export class GenerateLicenseDto {
  @IsString()
  adminSecret!: string;

  @Trim()
  @IsString({ message: 'Customer name is required' })
  @IsNotEmpty({ message: 'Customer name is required' })
  @MaxLength(MAX_CUSTOMER_NAME_LENGTH, {
    message: `Customer name must be ${MAX_CUSTOMER_NAME_LENGTH} characters or less`,
  })
  customerName!: string;

  @ValidateIf(isPresent)
  @Type(() => Number)
  @IsInt({ message: 'Validity days must be a whole number' })
  @Min(1, { message: `Validity days must be between 1 and ${MAX_VALIDITY_DAYS}` })
  @Max(MAX_VALIDITY_DAYS, { message: `Validity days must be between 1 and ${MAX_VALIDITY_DAYS}` })
  validityDays: number = 365;

  @IsOptional()
  @Trim()
  @IsEmail({}, { message: 'Customer email must be a valid email address' })
  customerEmail?: string;

  @ValidateIf(isPresent)
  @Type(() => Number)
  @IsInt({ message: 'Max activations must be a whole number' })
  @Min(1, { message: `Max activations must be between 1 and ${MAX_ACTIVATIONS_LIMIT}` })
  @Max(MAX_ACTIVATIONS_LIMIT, {
    message: `Max activations must be between 1 and ${MAX_ACTIVATIONS_LIMIT}`,
  })
  maxActivations: number = 1;
}
