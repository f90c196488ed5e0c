import {
  Injectable,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Logger,
} from '@nestjs/common';
import type { Request } from 'express';
import { readSignatureHeader, toRawBody, verifySignature } from '../../../core';
import { ConfigurationService } from '../services/configuration.service';

/**
 * Webhook Signature Guard
 *
 * Checks the HMAC-SHA256 signature of the raw body against the configured
 * shared secret. Lets everything through when no secret is set.
 *
 * Usage:
 * @UseGuards(WebhookSignatureGuard)
 */
@Injectable()
export class WebhookSignatureGuard implements CanActivate {
  private readonly logger = new Logger(WebhookSignatureGuard.name);

  constructor(private readonly configuration: ConfigurationService) {}

  canActivate(context: ExecutionContext): boolean {
    const secret = this.configuration.getWebhookSecret();
    if (!secret) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const signature = readSignatureHeader(request.headers);

    if (!verifySignature(toRawBody(request.body), signature, secret)) {
      this.logger.warn(
        `${signature ? 'Invalid' : 'Missing'} signature on ${request.method} ${request.path}`,
      );
      throw new ForbiddenException('Invalid webhook signature');
    }

    return true;
  }
}
