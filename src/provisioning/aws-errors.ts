import { ProviderCallError } from '../errors/index.js';

const NOT_FOUND_NAMES: ReadonlySet<string> = new Set([
  'NotFound',
  'NoSuchBucket',
  'NoSuchKey'
]);

/**
 * True for SDK errors meaning "no such entity": EC2's *.NotFound and
 * *.Malformed codes, S3's NotFound/NoSuchBucket, or a bare HTTP 404.
 */
export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (NOT_FOUND_NAMES.has(error.name) || error.name.endsWith('.NotFound') || error.name.endsWith('.Malformed')) {
    return true;
  }

  return httpStatusCode(error) === 404;
}

export function httpStatusCode(error: Error): number | undefined {
  if (!('$metadata' in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
    return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
  }
  return undefined;
}

/**
 * Run one provider request, wrapping any failure with the operation it was for.
 */
export async function callProvider<T>(operation: string, request: () => Promise<T>): Promise<T> {
  try {
    return await request();
  } catch (error) {
    throw new ProviderCallError(operation, error);
  }
}

/**
 * Existence probe: not-found errors mean absent, anything else is a failure.
 */
export async function probeExists(operation: string, request: () => Promise<boolean>): Promise<boolean> {
  try {
    return await request();
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw new ProviderCallError(operation, error);
  }
}
