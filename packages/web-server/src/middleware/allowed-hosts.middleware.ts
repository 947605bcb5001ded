import { Injectable, type NestMiddleware, BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request, Response, NextFunction } from 'express';

/**
 * `*` allows every host; `.example.com` allows the domain and its subdomains
 */
export function isHostAllowed(host: string, allowedHosts: readonly string[]): boolean {
  const hostname = host.replace(/:\d+$/, '').toLowerCase();
  return allowedHosts.some((pattern) => {
    const normalized = pattern.toLowerCase();
    if (normalized === '*') {
      return true;
    }
    if (normalized.startsWith('.')) {
      return hostname === normalized.slice(1) || hostname.endsWith(normalized);
    }
    return hostname === normalized;
  });
}

/**
 * Rejects requests whose Host header is not in ALLOWED_HOSTS
 */
@Injectable()
export class AllowedHostsMiddleware implements NestMiddleware {
  private readonly allowedHosts: string[];

  constructor(configService: ConfigService) {
    this.allowedHosts = configService.get<string[]>('allowedHosts') ?? ['*'];
  }

  public use(req: Request, _res: Response, next: NextFunction): void {
    const host = req.headers.host ?? '';
    if (!isHostAllowed(host, this.allowedHosts)) {
      throw new BadRequestException({ code: 'DISALLOWED_HOST', message: `Invalid HTTP_HOST header: '${host}'` });
    }
    next();
  }
}
