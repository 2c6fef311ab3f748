// =============================================================================
// Response helpers
//
// Every JSON body leaves the server through one of these two functions.
//   success → { success: true, data }
//   failure → { success: false, error, message, statusCode }
// =============================================================================

import { Response } from 'express';
import type { ApiSuccess, ApiError } from '../types';

export function sendSuccess<T>(
    res: Response,
    data: T,
    statusCode = 200
): Response<ApiSuccess<T>> {
    return res.status(statusCode).json({ success: true, data });
}

export function sendError(
    res: Response,
    statusCode: number,
    error: string,
    message: string
): Response<ApiError> {
    return res.status(statusCode).json({ success: false, error, message, statusCode });
}
