/**
 * Logger contract shared by the store adapters, guards and handlers.
 * Matches the logger a gateway host hands to its extensions.
 */

export type GatewaySecurityLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error?: (message: string) => void;
};

export const LOG_PREFIX = "[gateway-security]";

export const consoleLogger: GatewaySecurityLogger = {
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export const silentLogger: GatewaySecurityLogger = {
  info: () => undefined,
  warn: () => undefined,
};
