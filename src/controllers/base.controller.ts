import { Response } from 'express';

export abstract class BaseController {
  /**
   * Handle success response
   */
  protected success<T>(res: Response, data: T, message?: string, statusCode = 200): void {
    res.status(statusCode).json({
      success: true,
      message,
      data,
    });
  }
}
