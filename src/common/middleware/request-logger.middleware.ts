import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const REQUEST_ID_HEADER = 'x-request-id';

@Injectable()
export class RequestLoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger('RequestLogger');

  use(req: Request, res: Response, next: NextFunction): void {
    const startTime = Date.now();
    const { method, originalUrl, query, headers } = req;
    const incomingId = headers[REQUEST_ID_HEADER];
    const requestId = typeof incomingId === 'string' && incomingId ? incomingId : uuidv4().slice(0, 8);
    res.setHeader(REQUEST_ID_HEADER, requestId);

    this.logger.log(
      `[${requestId}] [${method}] ${originalUrl}` +
      `\nUA: ${headers['user-agent'] ?? 'unknown'}` +
      `\nQuery: ${JSON.stringify(query)}`
    );

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      const line = `[${requestId}] [${method}] ${originalUrl} - Status: ${res.statusCode} - Duration: ${duration}ms`;
      if (res.statusCode >= 500) {
        this.logger.error(line);
      } else if (res.statusCode >= 400) {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    });

    next();
  }
}
