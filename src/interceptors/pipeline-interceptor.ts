/**
 * grpc-record-store - Server Interceptors
 *
 * Runs the @struktos/core middleware pipeline around every gRPC handler.
 * The handler is the innermost step of the pipeline, so middlewares observe
 * the whole call.
 */

import { status as GrpcStatus, Metadata, StatusObject } from '@grpc/grpc-js';
import {
  RequestContext,
  IStruktosMiddleware,
  MiddlewareContext,
  StruktosRequest,
  StruktosResponse,
  HttpStatus,
} from '@struktos/core';
import {
  GrpcCall,
  GrpcCallback,
  GrpcContextData,
  GrpcHostOptions,
  InboundCall,
  MethodDefinition,
  MethodHandler,
  ServiceHandlers,
} from '../types';
import { CallContextFactory, createResponseMetadata, metadataToRecord } from '../context/factory';
import { httpStatusToGrpcStatus, toStatusObject } from '../service/errors';
import { createLogger, Logger } from '../logging/logger';

/**
 * MiddlewareContext item holding the gRPC status a unary or client-streaming
 * call was answered with
 */
export const GRPC_STATUS_ITEM = 'grpc.status';

/**
 * PipelineInterceptor - wraps service handlers with the middleware pipeline
 */
export class PipelineInterceptor {
  private readonly contextFactory: CallContextFactory;
  private readonly logger: Logger;

  constructor(
    private readonly middlewares: IStruktosMiddleware<GrpcContextData>[],
    private readonly options: GrpcHostOptions = {}
  ) {
    this.contextFactory = new CallContextFactory(options);
    this.logger = options.logger ?? createLogger({ name: options.name });
  }

  /**
   * Wrap every handler of a service implementation
   */
  wrapService(
    serviceName: string,
    implementation: ServiceHandlers,
    methodDefinitions: Map<string, MethodDefinition>
  ): ServiceHandlers {
    const wrapped: ServiceHandlers = {};

    for (const [methodName, handler] of Object.entries(implementation)) {
      const methodDef = methodDefinitions.get(methodName) ?? {
        service: serviceName,
        method: methodName,
        path: `/${serviceName}/${methodName}`,
        requestStream: false,
        responseStream: false,
      };

      wrapped[methodName] = this.wrapMethod(handler, methodDef);
    }

    return wrapped;
  }

  /**
   * Wrap a single handler with the middleware pipeline
   */
  private wrapMethod(method: MethodHandler, methodDef: MethodDefinition): MethodHandler {
    return async (call, callback) => {
      const startTime = Date.now();
      let handlerInvoked = false;

      try {
        await this.contextFactory.runWithContext(call, methodDef, async (context, contextData) => {
          const middlewareCtx = this.createMiddlewareContext(call, methodDef, context);

          const observedCallback: GrpcCallback | undefined =
            callback &&
            ((error, value, trailer, flags) => {
              middlewareCtx.items.set(GRPC_STATUS_ITEM, error?.code ?? GrpcStatus.OK);
              callback(error, value, trailer, flags);
            });

          await this.executePipeline(middlewareCtx, async () => {
            if (context.isCancelled()) {
              middlewareCtx.items.set(GRPC_STATUS_ITEM, GrpcStatus.CANCELLED);
              this.sendStatus(call, callback, {
                code: GrpcStatus.CANCELLED,
                details: 'Request was cancelled',
                metadata: new Metadata(),
              });
              return;
            }

            // Leading metadata echoes the trace and request IDs
            call.sendMetadata(createResponseMetadata(context));

            handlerInvoked = true;
            await method(call, observedCallback);
          });

          // A middleware answered the call itself (e.g. rejected it)
          if (!handlerInvoked && middlewareCtx.response.sent) {
            this.sendErrorResponse(call, callback, middlewareCtx.response);
            return;
          }

          const duration = Date.now() - startTime;
          this.options.onRequestComplete?.(contextData, duration);
        });
      } catch (error) {
        if (handlerInvoked) {
          // The handler has answered already; only the pipeline failed after it
          this.logger.error(`Middleware failed after ${methodDef.path} was answered`, toError(error));
          return;
        }
        this.sendStatus(call, callback, toStatusObject(error));
      }
    };
  }

  /**
   * Create middleware context from gRPC call
   */
  private createMiddlewareContext(
    call: GrpcCall,
    methodDef: MethodDefinition,
    context: RequestContext<GrpcContextData>
  ): MiddlewareContext<GrpcContextData> {
    const request: StruktosRequest = {
      id: context.get('requestId') || `grpc-${Date.now()}`,
      method: 'POST', // gRPC is always POST-like
      path: methodDef.path,
      headers: metadataToRecord(call.metadata),
      query: {},
      params: {
        service: methodDef.service,
        method: methodDef.method,
      },
      body: 'request' in call ? call.request : undefined,
      ip: call.getPeer(),
      protocol: 'grpc',
      raw: call,
      metadata: {
        callType: context.get('callType'),
        deadline: context.get('deadline'),
      },
    };

    const response: StruktosResponse = {
      status: HttpStatus.OK,
      headers: {},
      sent: false,
    };

    return {
      context,
      request,
      response,
      items: new Map(),
    };
  }

  /**
   * Execute the middleware pipeline with `handler` as its innermost step
   */
  private async executePipeline(
    ctx: MiddlewareContext<GrpcContextData>,
    handler: () => Promise<void>
  ): Promise<void> {
    let index = 0;

    const next = async (): Promise<void> => {
      if (index < this.middlewares.length) {
        const middleware = this.middlewares[index++];
        await middleware.invoke(ctx, next);
      } else if (index === this.middlewares.length) {
        index++;
        await handler();
      }
    };

    await next();
  }

  /**
   * Send the error a middleware put on the response
   */
  private sendErrorResponse(
    call: InboundCall,
    callback: GrpcCallback | undefined,
    response: StruktosResponse
  ): void {
    const body: unknown = response.body;
    const message = bodyMessage(body);

    const metadata = new Metadata();
    if (body && typeof body === 'object') {
      metadata.set('error-details', JSON.stringify(body));
    }

    this.sendStatus(call, callback, {
      code: httpStatusToGrpcStatus(response.status),
      details: message,
      metadata,
    });
  }

  /**
   * Deliver a non-OK status through the callback, or on the stream for
   * server-streaming calls
   */
  private sendStatus(call: InboundCall, callback: GrpcCallback | undefined, status: StatusObject): void {
    if (callback) {
      callback(status, null);
      return;
    }
    call.emit('error', status);
  }
}

function bodyMessage(body: unknown): string {
  if (body && typeof body === 'object') {
    const message: unknown = Reflect.get(body, 'message');
    return typeof message === 'string' ? message : 'Error';
  }
  return body === undefined || body === null || body === '' ? 'Error' : String(body);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create a logging interceptor
 */
export function createLoggingInterceptor(
  options: { logger?: Logger; logRequests?: boolean; logResponses?: boolean } = {}
): IStruktosMiddleware<GrpcContextData> {
  const { logRequests = true, logResponses = true } = options;
  const logger = options.logger ?? createLogger();

  return {
    async invoke(ctx, next) {
      const traceId = ctx.context.get('traceId');
      const rpc = `${ctx.request.params.service}/${ctx.request.params.method}`;

      if (logRequests) {
        logger.info(`→ gRPC ${rpc}`, { traceId });
      }

      const start = Date.now();
      await next();
      const duration = Date.now() - start;

      if (logResponses) {
        const code = ctx.items.get(GRPC_STATUS_ITEM);
        logger.info(`← gRPC ${rpc}`, {
          traceId,
          status: typeof code === 'number' ? GrpcStatus[code] : GrpcStatus[GrpcStatus.OK],
          durationMs: duration,
        });
      }
    },
  };
}

/**
 * Create a timeout interceptor. Cancels the call's context when the rest of
 * the pipeline, handler included, outlives `timeoutMs`.
 */
export function createTimeoutInterceptor(timeoutMs: number): IStruktosMiddleware<GrpcContextData> {
  return {
    async invoke(ctx, next) {
      const context = ctx.context;

      const timeoutId = setTimeout(() => {
        if (!context.isCancelled()) {
          context.cancel();
        }
      }, timeoutMs);

      try {
        await next();
      } finally {
        clearTimeout(timeoutId);
      }
    },
  };
}
