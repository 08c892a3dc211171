import { HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import type { ZodError } from 'zod';

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  issues?: string[];
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'body'}: ${issue.message}`);
}

/**
 * 400 for a body or query that failed its schema
 */
export function sendInvalidRequest(res: Response, error: ZodError): void {
  res.status(HttpStatus.BAD_REQUEST).json({
    success: false,
    error: 'Invalid request',
    code: 'invalid_request',
    issues: formatZodIssues(error),
  } satisfies ApiResponse);
}

export function sendInternalError(res: Response): void {
  res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
    success: false,
    error: 'Internal error. Please try again.',
    code: 'internal_error',
  } satisfies ApiResponse);
}
