import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, timingSafeEqual } from 'crypto';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Holds the shared administrative secret. Comparison hashes both sides first,
 * so it takes the same time whatever the candidate's length.
 */
@Injectable()
export class AdminSecretService {
  private readonly logger = new Logger(AdminSecretService.name);
  private readonly secretDigest: Buffer | null;

  constructor(configService: ConfigService) {
    const secret = configService.get<string>('ADMIN_SECRET');
    this.secretDigest = secret ? digest(secret) : null;
    if (!this.secretDigest) {
      this.logger.warn('⚠️ ADMIN_SECRET is not set; administrative endpoints will reject every request');
    }
  }

  matches(candidate: string): boolean {
    if (!this.secretDigest) {
      return false;
    }
    return timingSafeEqual(digest(candidate), this.secretDigest);
  }
}
