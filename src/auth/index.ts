export {
  type Authorizer,
  isAuthorizer,
  isRefreshable,
  type RefreshableAuthorizer,
  RefreshingAuthorizer,
  type RefreshingAuthorizerOptions,
  StaticAuthorizer,
  type StaticAuthorizerOptions,
  type TokenGrant,
  TokenGrantSchema,
} from './authorizer.js';
