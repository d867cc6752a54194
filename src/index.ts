export { RoomResolver } from './rooms.js';
export type {
  RoomConfiguration,
  RoomConfigurationRef,
  RoomResolverOptions,
  Resolution,
  ResolutionSource,
} from './rooms.js';
export { UsernameAliasTable } from './aliases.js';
export type { UsernameAliasLookup } from './aliases.js';
export { caseFoldEquals, caseFoldHash, foldCodePoint } from './casefold.js';
export { ConfigError, EnvSchema, describeConfig, loadConfig } from './config.js';
export type { BotConfig, ConfigSummary, GitHubCredentials } from './config.js';
export { planDeliveries, displayAuthor } from './router.js';
export type { Delivery, DeliveryTier } from './router.js';
export { authorizeEvent, signPayload, verifySignature } from './signature.js';
export { logger } from './logger.js';
export type { LogTier } from './logger.js';
