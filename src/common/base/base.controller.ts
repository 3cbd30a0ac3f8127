import { v4 as uuidv4 } from "uuid";
import type { Request } from "express";
import { BaseService } from "./base.service";
import { asError } from "../utils/error.utils";

/**
 * Base controller: request ids and timed, logged execution of handler bodies
 */
export abstract class BaseController extends BaseService {
  protected readonly startupTime: number = Date.now();

  public generateRequestId(): string {
    return uuidv4();
  }

  /**
   * Reuses an id set by the front door when there is one
   */
  protected requestIdOf(request: Request): string {
    return request.get("X-Request-ID") ?? this.generateRequestId();
  }

  /**
   * Runs `operation`, logging slow and failed runs. Errors are rethrown for the exception filter.
   */
  protected async executeOperation<T>(
    operation: () => Promise<T>,
    operationName: string,
    options: { requestId?: string; performanceThreshold?: number } = {}
  ): Promise<T> {
    const { requestId = this.generateRequestId(), performanceThreshold = 1000 } = options;
    const startedAt = performance.now();

    try {
      const result = await operation();
      this.logPerformance(`${operationName} [${requestId}]`, Math.round(performance.now() - startedAt), performanceThreshold);
      return result;
    } catch (error) {
      const duration = Math.round(performance.now() - startedAt);
      this.logger.debug(`${operationName} [${requestId}] failed after ${duration}ms: ${asError(error).message}`);
      throw error;
    }
  }

  protected getUptime(): number {
    return Date.now() - this.startupTime;
  }
}
