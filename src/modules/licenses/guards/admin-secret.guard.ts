import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import { AdminSecretService } from '../admin-secret.service';

/**
 * Checks `adminSecret` in the request body. Guards run before pipes, so a bad
 * secret is reported ahead of any body validation error.
 */
@Injectable()
export class AdminSecretGuard implements CanActivate {
  private readonly logger = new Logger(AdminSecretGuard.name);

  constructor(private readonly adminSecretService: AdminSecretService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const body: unknown = request.body;
    const supplied =
      typeof body === 'object' &&
      body !== null &&
      'adminSecret' in body &&
      typeof body.adminSecret === 'string'
        ? body.adminSecret
        : '';

    if (!supplied || !this.adminSecretService.matches(supplied)) {
      this.logger.warn(`🚫 Unauthorized admin request to ${request.url} from IP: ${request.ip}`);
      throw new UnauthorizedException('Invalid admin secret');
    }
    return true;
  }
}
