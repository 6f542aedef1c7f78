import { IsString, IsNotEmpty, IsOptional, MaxLength } from 'class-validator';

export class ValidateLicenseDto {
  @IsString()
  @IsNotEmpty({ message: 'License key is required' })
  @MaxLength(200)
  licenseKey!: string;

  @IsString()
  @IsNotEmpty({ message: 'Hardware fingerprint is required' })
  @MaxLength(100)
  hardwareFingerprint!: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  machineName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  productVersion?: string;
}
