export * from "./errors";
export * from "./types";
export { createLogger, silentLogger, type Logger } from "./logger";
export { loadConfig, DEFAULT_DOCKER_REGISTRY } from "./config";
export { parseImageReference, stripRegistryHost } from "./imageReference";
export { DOCKER_CONFIG_JSON_KEY, parseDockerConfig, pickPullSecret, resolveCredentials } from "./credentials";
export { createSecretReader } from "./kubernetes";
export { createRegistry, decodeImageConfig, fetchEntrypointCmd, type Registry, type RegistryOptions } from "./registry";
export { createResolver, getEntrypointCmd, type Resolver, type ResolverDependencies } from "./resolver";
