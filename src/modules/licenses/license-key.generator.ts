import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomInt } from 'crypto';

export const KEY_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const KEY_GROUP_COUNT = 4;
export const KEY_GROUP_LENGTH = 4;
export const DEFAULT_KEY_PREFIX = 'LAS';

const PREFIX_PATTERN = /^[A-Z0-9]{1,16}$/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Matches keys produced for `prefix`:
 * `PREFIX-YYMMDD-XXXX-XXXX-XXXX-XXXX`.
 */
export function licenseKeyPattern(prefix: string): RegExp {
  const group = `[A-Z0-9]{${KEY_GROUP_LENGTH}}`;
  return new RegExp(`^${prefix}-\\d{6}(?:-${group}){${KEY_GROUP_COUNT}}$`);
}

@Injectable()
export class LicenseKeyGenerator {
  readonly prefix: string;

  constructor(configService: ConfigService) {
    const prefix = (configService.get<string>('LICENSE_KEY_PREFIX') || DEFAULT_KEY_PREFIX)
      .trim()
      .toUpperCase();
    if (!PREFIX_PATTERN.test(prefix)) {
      throw new Error(
        `LICENSE_KEY_PREFIX must be 1-16 characters from A-Z and 0-9, got "${prefix}"`,
      );
    }
    this.prefix = prefix;
  }

  /** Total length of every key this generator produces. */
  get keyLength(): number {
    return this.prefix.length + 1 + 6 + KEY_GROUP_COUNT * (KEY_GROUP_LENGTH + 1);
  }

  /**
   * Generate a license key
   * Format: PREFIX-YYMMDD-XXXX-XXXX-XXXX-XXXX (UTC date, then 4 random groups)
   */
  generate(now: Date = new Date()): string {
    const date =
      pad2(now.getUTCFullYear() % 100) + pad2(now.getUTCMonth() + 1) + pad2(now.getUTCDate());

    const groups: string[] = [];
    for (let i = 0; i < KEY_GROUP_COUNT; i++) {
      let group = '';
      for (let j = 0; j < KEY_GROUP_LENGTH; j++) {
        group += KEY_ALPHABET.charAt(randomInt(KEY_ALPHABET.length));
      }
      groups.push(group);
    }

    return [this.prefix, date, ...groups].join('-');
  }
}
