import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { safeCompare } from '../utils/crypto';

/**
 * Guards /api routes with the shared X-API-Key secret issued to the studio backend.
 */
export function apiKeyAuth(req: Request, res: Response, next: NextFunction): void {
  const apiKey = req.header('x-api-key');

  if (!apiKey) {
    res.status(401).json({
      success: false,
      error: { code: 'MISSING_API_KEY', message: 'X-API-Key header is required' },
    });
    return;
  }

  if (!safeCompare(apiKey, config.apiKey)) {
    res.status(401).json({
      success: false,
      error: { code: 'INVALID_API_KEY', message: 'Invalid API key' },
    });
    return;
  }

  next();
}
