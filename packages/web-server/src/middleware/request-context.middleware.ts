/**
 * RequestContextMiddleware
 *
 * Runs the rest of the request inside an AsyncLocalStorage context holding
 * the request id, client address and user agent. Core services read it when
 * they write admin audit entries.
 */

import { Injectable, type NestMiddleware } from '@nestjs/common';
import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithRequestContext, type RequestContext } from '@contractor-connect/core';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * First X-Forwarded-For hop, else the socket address
 */
export function clientAddress(req: Pick<Request, 'headers' | 'ip'>): string | undefined {
  const forwarded = req.headers['x-forwarded-for'];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(',')[0]?.trim();
  return first !== undefined && first !== '' ? first : req.ip;
}

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  public use(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.headers[REQUEST_ID_HEADER];
    const context: RequestContext = {
      requestId: typeof incoming === 'string' && incoming.trim() !== '' ? incoming.trim() : uuidv4(),
      ipAddress: clientAddress(req),
      userAgent: req.headers['user-agent'],
    };
    res.setHeader(REQUEST_ID_HEADER, context.requestId);

    // The context only follows async continuations, so it has to stay open
    // until the response is finished or the socket closes.
    runWithRequestContext(context, async () => {
      await new Promise<void>((resolve) => {
        let resolved = false;

        const cleanup = (): void => {
          if (!resolved) {
            resolved = true;
            res.removeListener('finish', cleanup);
            res.removeListener('close', cleanup);
            resolve();
          }
        };

        res.on('finish', cleanup);
        res.on('close', cleanup);
        next();
      });
    }).catch((error: unknown) => {
      next(error);
    });
  }
}
