/**
 * grpc-record-store - gRPC Host
 *
 * GrpcHost owns the grpc-js Server: it registers services, installs the
 * @struktos/core middleware pipeline around their handlers and manages the
 * server lifecycle.
 */

import { Server, ServerCredentials, ServiceDefinition } from '@grpc/grpc-js';
import { IStruktosMiddleware } from '@struktos/core';
import {
  GrpcContextData,
  GrpcHostOptions,
  GrpcServiceDefinition,
  MethodDefinition,
  ProtoLoaderOptions,
  ServerInfo,
  ServiceHandlers,
} from '../types';
import { PipelineInterceptor } from '../interceptors/pipeline-interceptor';
import { loadServiceDefinition } from '../utils/proto';
import { createLogger, Logger } from '../logging/logger';

const DEFAULT_PORT = 50051;
const DEFAULT_HOST = '0.0.0.0';

/**
 * GrpcHost - gRPC server with a middleware pipeline
 *
 * @example
 * ```typescript
 * const host = new GrpcHost({ logger });
 * await host.init([createLoggingInterceptor({ logger })]);
 * await host.addProtoService(RECORD_STORE_PROTO_PATH, RECORD_SERVICE_NAME, handlers);
 * const info = await host.start(0, '127.0.0.1');
 * ```
 */
export class GrpcHost {
  readonly name: string;
  readonly protocol = 'grpc' as const;

  private server: Server | null = null;
  private running = false;
  private services: Map<string, GrpcServiceDefinition> = new Map();
  private methodDefinitions: Map<string, Map<string, MethodDefinition>> = new Map();
  private interceptor: PipelineInterceptor | null = null;
  private readonly credentials: ServerCredentials;
  private readonly logger: Logger;

  constructor(private readonly options: GrpcHostOptions = {}) {
    this.name = options.name ?? 'grpc-host';
    this.credentials = options.credentials ?? ServerCredentials.createInsecure();
    this.logger = (options.logger ?? createLogger()).child({ component: this.name });
  }

  // ==================== Lifecycle ====================

  /**
   * Install the middleware pipeline. Takes effect on the next start().
   */
  async init(middlewares: IStruktosMiddleware<GrpcContextData>[]): Promise<void> {
    this.interceptor = new PipelineInterceptor(middlewares, { ...this.options, logger: this.logger });
    await this.onInit?.();
  }

  /**
   * Bind and start the server. Port 0 binds a free port, reported in the result.
   */
  async start(port: number = DEFAULT_PORT, host: string = DEFAULT_HOST): Promise<ServerInfo> {
    if (this.running) {
      throw new Error('gRPC server is already running');
    }

    await this.onBeforeStart?.();

    const server = new Server(this.options.serverOptions);

    for (const [serviceName, service] of this.services) {
      const methodDefs = this.methodDefinitions.get(serviceName) ?? new Map<string, MethodDefinition>();

      const implementation = this.interceptor
        ? this.interceptor.wrapService(serviceName, service.implementation, methodDefs)
        : service.implementation;

      server.addService(service.definition, implementation);
    }

    const boundPort = await new Promise<number>((resolve, reject) => {
      server.bindAsync(`${host}:${port}`, this.credentials, (error, actualPort) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(actualPort);
      });
    });

    this.server = server;
    this.running = true;

    const info: ServerInfo = {
      protocol: 'grpc',
      host,
      port: boundPort,
      url: `grpc://${host}:${boundPort}`,
      metadata: {
        services: Array.from(this.services.keys()),
      },
    };
    this.logger.info(`gRPC server listening on ${host}:${boundPort}`, { services: info.metadata.services });

    await this.onAfterStart?.();
    return info;
  }

  /**
   * Stop accepting calls and wait for in-flight calls to finish
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!this.running || !server) {
      return;
    }

    await this.onBeforeStop?.();

    await new Promise<void>((resolve) => {
      server.tryShutdown((error) => {
        if (error) {
          this.logger.warn('Graceful shutdown failed, forcing', { error: error.message });
          server.forceShutdown();
        }
        resolve();
      });
    });

    this.markStopped();
    await this.onAfterStop?.();
  }

  /**
   * Stop immediately, cancelling every in-flight call
   */
  async forceStop(): Promise<void> {
    const server = this.server;
    if (!this.running || !server) {
      return;
    }

    await this.onBeforeStop?.();
    server.forceShutdown();
    this.markStopped();
    await this.onAfterStop?.();
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Get the underlying gRPC server
   */
  getServer(): Server | null {
    return this.server;
  }

  getCredentials(): ServerCredentials {
    return this.credentials;
  }

  // ==================== Service Registration ====================

  /**
   * Add a gRPC service with definition
   */
  addService(definition: ServiceDefinition, implementation: ServiceHandlers): void {
    const serviceName = extractServiceName(definition);

    this.services.set(serviceName, { definition, implementation });
    this.methodDefinitions.set(serviceName, extractMethodDefinitions(serviceName, definition));
  }

  /**
   * Load a service from a proto file and add it
   */
  async addProtoService(
    protoPath: string,
    servicePath: string,
    implementation: ServiceHandlers,
    loaderOptions?: ProtoLoaderOptions
  ): Promise<void> {
    const definition = await loadServiceDefinition(protoPath, servicePath, loaderOptions);
    this.addService(definition, implementation);
  }

  private markStopped(): void {
    this.running = false;
    this.server = null;
    this.logger.info('gRPC server stopped');
  }

  // ==================== Lifecycle Hooks ====================

  onInit?(): Promise<void>;
  onBeforeStart?(): Promise<void>;
  onAfterStart?(): Promise<void>;
  onBeforeStop?(): Promise<void>;
  onAfterStop?(): Promise<void>;
}

/**
 * Service name from the path of its first method (/package.Service/Method)
 */
function extractServiceName(definition: ServiceDefinition): string {
  for (const method of Object.values(definition)) {
    const parts = method.path.split('/');
    if (parts.length >= 2 && parts[1]) {
      return parts[1];
    }
  }
  throw new Error('Service definition has no methods');
}

function extractMethodDefinitions(
  serviceName: string,
  definition: ServiceDefinition
): Map<string, MethodDefinition> {
  const methods = new Map<string, MethodDefinition>();

  for (const [methodName, method] of Object.entries(definition)) {
    methods.set(methodName, {
      service: serviceName,
      method: methodName,
      path: method.path || `/${serviceName}/${methodName}`,
      requestStream: method.requestStream,
      responseStream: method.responseStream,
    });
  }

  return methods;
}

/**
 * Create a new gRPC host
 */
export function createGrpcHost(options?: GrpcHostOptions): GrpcHost {
  return new GrpcHost(options);
}
