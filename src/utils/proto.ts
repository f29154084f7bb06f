/**
 * grpc-record-store - Proto Loading
 */

import * as protoLoader from '@grpc/proto-loader';
import type { ProtoLoaderOptions } from '../types';

/**
 * Default proto loader options. Field names keep their proto (snake_case) spelling.
 */
export const DEFAULT_PROTO_OPTIONS: ProtoLoaderOptions = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

/**
 * Load `protoPath` and return the method definitions of the service named by
 * its fully qualified path (e.g. `recordstore.RecordService`)
 */
export async function loadServiceDefinition(
  protoPath: string,
  servicePath: string,
  loaderOptions?: ProtoLoaderOptions
): Promise<protoLoader.ServiceDefinition> {
  const packageDefinition = await protoLoader.load(protoPath, {
    ...DEFAULT_PROTO_OPTIONS,
    ...loaderOptions,
  });

  const definition = packageDefinition[servicePath];
  if (!definition) {
    throw new Error(`Service not found: ${servicePath}`);
  }
  if ('format' in definition) {
    throw new Error(`Invalid service definition: ${servicePath}`);
  }

  return definition;
}
