import type { AuditLogger } from '../audit.js';
import type { Logger } from '../logger.js';
import type { Store } from '../store/index.js';

export interface ControllerContext {
  store: Store;
  audit: AuditLogger;
  logger: Logger;
  now?: () => Date;
}

export interface UpdateOptions {
  /** PATCH semantics: fields may be omitted. */
  partial: boolean;
}
