/**
 * Test fixture: module without any handler class.
 */

import { Request } from '../../../src/types/request.js';

export const VERSION = '1.0.0';

export class OrphanQuery extends Request<string> {}

export function helper(): string {
  return 'helper';
}
