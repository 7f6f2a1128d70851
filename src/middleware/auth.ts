import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('auth');

function extractBearerToken(req: Request): string | null {
	const value = req.headers.authorization;
	if (!value) return null;
	const [scheme, token] = value.split(' ');
	if (!scheme || scheme.toLowerCase() !== 'bearer') return null;
	return token?.trim() || null;
}

function tokensMatch(presented: string, expected: string): boolean {
	const a = Buffer.from(presented);
	const b = Buffer.from(expected);
	return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Guard for administrative routes. With no admin token configured the
 * routes are disabled (503); otherwise the bearer token must match.
 */
export function requireAdmin(adminApiToken: string | null) {
	return (req: Request, _res: Response, next: NextFunction): void => {
		if (!adminApiToken) {
			next(AppError.unavailable('Admin API is disabled: ADMIN_API_TOKEN is not set'));
			return;
		}
		const token = extractBearerToken(req);
		if (!token) {
			next(AppError.unauthorized('Authorization token required'));
			return;
		}
		if (!tokensMatch(token, adminApiToken)) {
			logger.warn({ path: req.path }, 'rejected admin token');
			next(AppError.unauthorized('Invalid admin token'));
			return;
		}
		next();
	};
}
