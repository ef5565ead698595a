import { createHash } from 'node:crypto';

/**
 * Content-addressed id: prefix + md5 hex digest
 */
export function computeMdhashId(content: string, prefix = ''): string {
  return prefix + createHash('md5').update(content).digest('hex');
}
