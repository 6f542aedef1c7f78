import { IsString, IsNotEmpty, MaxLength } from 'class-validator';
import { Trim } from './trim.transform';

export class DeactivateLicenseDto {
  @IsString()
  adminSecret!: string;

  @Trim()
  @IsString()
  @IsNotEmpty({ message: 'License key is required' })
  @MaxLength(200)
  licenseKey!: string;
}
