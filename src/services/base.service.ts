import { logger } from '@/lib/logger';
import { ConfigurationError } from '@/lib/errors';

/**
 * Base service class that provides common functionality for all services
 */
export abstract class BaseService {
  protected logger = logger;

  /**
   * Log service operations for debugging and monitoring
   */
  protected logOperation(operation: string, data?: Record<string, unknown>): void {
    this.logger.info(`Service operation: ${operation}`, {
      operation,
      ...data,
    });
  }

  /**
   * Validate required parameters
   */
  protected validateRequired(params: Record<string, unknown>, requiredFields: string[]): void {
    const missingFields = requiredFields.filter(
      field => params[field] === undefined || params[field] === null || params[field] === ''
    );

    if (missingFields.length > 0) {
      throw new ConfigurationError(missingFields.map(field => `${field} is required`));
    }
  }
}
