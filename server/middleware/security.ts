/**
 * Security Middleware
 * 
 * Security headers for all responses and brute-force protection for the
 * credential endpoints.
 */

import type { Request, Response, NextFunction } from 'express';
import { RATE_LIMIT_CONSTANTS } from '../config/constants';
import { RateLimitError } from '../utils/errorHandler';

/**
 * Security headers middleware.
 * Adds essential security headers to all responses.
 */
export function addSecurityHeaders(req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');

    res.setHeader('Referrer-Policy', 'no-referrer');

    // API responses carry tokens and inbox content
    res.setHeader('Cache-Control', 'no-store');

    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    next();
}

/**
 * Rate limiting for authentication endpoints.
 * Prevents brute force attacks on login and refresh.
 */
const authAttempts = new Map<string, { count: number; resetTime: number }>();

export function authRateLimit(req: Request, res: Response, next: NextFunction) {
    const clientId = req.ip || 'unknown';
    const now = Date.now();
    const windowMs = RATE_LIMIT_CONSTANTS.AUTH_WINDOW_MS;
    const maxAttempts = RATE_LIMIT_CONSTANTS.AUTH_MAX_ATTEMPTS;

    // Drop finished windows
    authAttempts.forEach((data, key) => {
        if (now > data.resetTime) authAttempts.delete(key);
    });

    const clientData = authAttempts.get(clientId);

    if (!clientData) {
        authAttempts.set(clientId, { count: 1, resetTime: now + windowMs });
        return next();
    }

    if (clientData.count >= maxAttempts) {
        const retryAfter = Math.ceil((clientData.resetTime - now) / 1000);
        res.set('Retry-After', retryAfter.toString());
        return next(new RateLimitError('Too many authentication attempts'));
    }

    clientData.count++;
    next();
}

export function resetAuthRateLimit(): void {
    authAttempts.clear();
}
