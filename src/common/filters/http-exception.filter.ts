import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Optional } from "@nestjs/common";
import { FastifyReply, FastifyRequest } from "fastify";
import { AppLoggingService } from "../../core/logging/services/logging.service";

/**
 * Renders any exception escaping a route as a JSON:API errors document.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(@Optional() private readonly logger?: AppLoggingService) {}

  /**
   * Messages produced by the ValidationPipe, or null for other exceptions
   */
  private extractValidationErrors(exception: HttpException): string[] | null {
    const response = exception.getResponse();
    if (typeof response === "object" && response !== null && "message" in response) {
      const { message } = response;
      if (Array.isArray(message)) return message.map(String);
    }
    return null;
  }

  private extractDetail(exception: unknown): string {
    if (!(exception instanceof HttpException)) return "Internal server error";

    const response = exception.getResponse();
    if (typeof response === "string") return response;

    if ("message" in response) {
      const { message } = response;
      if (typeof message === "string") return message;
      if (Array.isArray(message)) return message.join(", ");
    }

    return "An error occurred";
  }

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    const status = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const trace = exception instanceof Error ? exception.stack : String(exception);

    const validationErrors = exception instanceof HttpException ? this.extractValidationErrors(exception) : null;
    if (validationErrors) {
      const formatted = validationErrors.map((e) => `  - ${e}`).join("\n");
      this.logger?.error(
        `Unhandled Exception: ${status} - ${request.method} ${request.url}\n\nValidation Errors:\n${formatted}`,
        trace,
        HttpExceptionFilter.name,
      );
    } else {
      this.logger?.error(`Unhandled Exception: ${status} - ${request.method} ${request.url}`, trace, HttpExceptionFilter.name);
    }

    const detail = this.extractDetail(exception);

    response.status(status).send({
      message: detail,
      errors: [
        {
          status: status.toString(),
          title: HttpStatus[status] || "Unknown Error",
          detail,
          source: {
            pointer: request.url,
          },
          meta: {
            timestamp: new Date().toISOString(),
            path: request.url,
            method: request.method,
          },
        },
      ],
    });
  }
}
