export { AuditLogger, type AuditEvent, type AuditModel } from './audit.js';
export { loadConfigFromEnv, type RuntimeConfig } from './config.js';
export { CommentsController, withoutApproval } from './controllers/comments.js';
export type { ControllerContext, UpdateOptions } from './controllers/context.js';
export { PostsController } from './controllers/posts.js';
export {
  DatabaseConnection,
  migrate,
  openConnection,
  PostgresConnection,
  type Connection,
  type Queryable,
} from './db/index.js';
export {
  ApiError,
  AuthenticationRequired,
  NotFound,
  PermissionDenied,
  ValidationError,
  type ErrorBody,
  type ErrorKind,
} from './errors.js';
export {
  createAuthenticator,
  issueMockToken,
  loadAuthConfigFromEnv,
  mapPayloadToCaller,
  type AuthConfig,
  type Authenticator,
} from './http/auth.js';
export { buildServer, type ServerOptions } from './http/server.js';
export type { Logger } from './logger.js';
export { authorize, canAccess, type Action, type Resource } from './policy/access.js';
export { ANONYMOUS, isAuthenticated, isStaff, type Caller, type Role } from './policy/caller.js';
export { visibilityClause, visibleSet } from './policy/visibility.js';
export { createStore, type Repositories, type Store } from './store/index.js';
export type * from './types.js';
