/**
 * Response Formatter
 * Utility functions for formatting API responses
 */
import { Response } from "express";
import type { ServiceResult } from "../services/context.js";

/**
 * Send success response
 */
export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  res.status(statusCode).json(data);
}

/**
 * Send error response
 */
export function sendError(res: Response, error: string | Error, statusCode: number = 500): void {
  const errorMessage = error instanceof Error ? error.message : error;
  res.status(statusCode).json({ error: errorMessage });
}

/**
 * Send validation error response
 */
export function sendValidationError(res: Response, error: string): void {
  sendError(res, error, 400);
}

/**
 * Send not found error response
 */
export function sendNotFound(res: Response, error: string = 'Resource not found'): void {
  sendError(res, error, 404);
}

/**
 * Send the value of a successful service call, or its error with the service's status
 */
export function sendServiceResult<T>(res: Response, result: ServiceResult<T>): void {
  if (result.ok) {
    sendSuccess(res, result.value);
  } else {
    sendError(res, result.error, result.statusCode);
  }
}
