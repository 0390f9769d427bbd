import { V1Container, V1PodSpec } from "@kubernetes/client-node";

import { pickPullSecret, resolveCredentials } from "./credentials";
import { parseImageReference, stripRegistryHost, withDefaultNamespace } from "./imageReference";
import { Logger, silentLogger } from "./logger";
import { fetchEntrypointCmd } from "./registry";
import { ContainerImageConfig, PullContext, ResolverConfig, SecretReader } from "./types";

const DOCKER_HUB_HOSTS = ["docker.io", "index.docker.io", "registry-1.docker.io"];

/** Docker config files name Docker Hub `https://index.docker.io/v1/`, which is not a v2 endpoint. */
function isDockerHub(registryName: string): boolean {
	const host = registryName.replace(/^https?:\/\//, "").split("/")[0];
	return DOCKER_HUB_HOSTS.includes(host);
}

export type ResolverDependencies = {
	secrets: SecretReader;
	config: ResolverConfig;
	logger?: Logger;
};

export type Resolver = {
	getEntrypointCmd: (namespace: string, container: V1Container, podSpec: V1PodSpec) => Promise<ContainerImageConfig>;
};

export function buildPullContext(
	namespace: string,
	container: V1Container,
	podSpec: V1PodSpec,
	logger: Logger,
): PullContext {
	return {
		namespace,
		secretName: pickPullSecret(podSpec, logger),
		image: container.image ?? "",
	};
}

/**
 * Looks up the entrypoint and cmd baked into the container's image. Every
 * failure rejects with a ResolutionError subclass; nothing is retried.
 */
export async function getEntrypointCmd(
	namespace: string,
	container: V1Container,
	podSpec: V1PodSpec,
	dependencies: ResolverDependencies,
): Promise<ContainerImageConfig> {
	const { secrets, config } = dependencies;
	const logger = dependencies.logger ?? silentLogger;
	const context = buildPullContext(namespace, container, podSpec, logger);
	const credentials = await resolveCredentials(secrets, context, logger);

	let image = context.image;
	let registryAddress = credentials.address || config.defaultRegistry;
	if (credentials.registryName) {
		if (isDockerHub(credentials.registryName)) {
			registryAddress = config.defaultRegistry;
			image = DOCKER_HUB_HOSTS.reduce((stripped, host) => stripRegistryHost(stripped, host), image);
		} else {
			image = stripRegistryHost(image, credentials.registryName);
		}
		logger.debug(`Trimmed registry name ${credentials.registryName} from image name ${context.image}`);
	}

	const reference = parseImageReference(image);
	const repository =
		registryAddress == config.defaultRegistry ? withDefaultNamespace(reference.repository) : reference.repository;
	logger.info(`Using registry ${registryAddress} for ${repository}:${reference.tag}`);

	return fetchEntrypointCmd(registryAddress, credentials.username, credentials.password, repository, reference.tag, {
		allowInsecure: config.allowInsecure,
		timeoutMs: config.timeoutMs,
		platform: config.platform,
		logger,
	});
}

export function createResolver(dependencies: ResolverDependencies): Resolver {
	return {
		getEntrypointCmd: (namespace, container, podSpec) =>
			getEntrypointCmd(namespace, container, podSpec, dependencies),
	};
}
