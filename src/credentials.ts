import { V1PodSpec } from "@kubernetes/client-node";
import { z } from "zod";

import { MalformedSecretError, RegistryConnectionError, SecretNotFoundError, TimeoutError } from "./errors";
import { Logger } from "./logger";
import { DockerAuthEntry, DockerConfigAuths, PullContext, RegistryCredentials, SecretReader } from "./types";

export const DOCKER_CONFIG_JSON_KEY = ".dockerconfigjson";

const DockerConfigSchema = z.object({
	auths: z.record(
		z.object({
			username: z.string().optional(),
			password: z.string().optional(),
			auth: z.string().optional(),
		}),
	),
});

export function anonymousCredentials(): RegistryCredentials {
	return { address: "", registryName: "", username: "", password: "" };
}

/** Only the first pull secret is consulted. */
export function pickPullSecret(podSpec: V1PodSpec, logger: Logger): string {
	const secrets = podSpec.imagePullSecrets ?? [];
	if (secrets.length > 1) {
		logger.debug(
			"Ignoring imagePullSecrets",
			secrets.slice(1).map((s) => s.name),
		);
	}
	return secrets[0]?.name ?? "";
}

function splitAuth(entry: DockerAuthEntry): { username: string; password: string } {
	if (entry.username || !entry.auth) {
		return { username: entry.username ?? "", password: entry.password ?? "" };
	}
	const decoded = Buffer.from(entry.auth, "base64").toString("utf-8");
	const separator = decoded.indexOf(":");
	if (separator == -1) return { username: decoded, password: "" };
	return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

/**
 * Picks one registry from a docker config JSON payload. With several `auths`
 * entries the lexicographically smallest host wins.
 */
export function parseDockerConfig(payload: string, secretName: string): RegistryCredentials {
	let json: unknown;
	try {
		json = JSON.parse(payload);
	} catch (e) {
		throw new MalformedSecretError(secretName, "invalid JSON", e);
	}
	const parsed = DockerConfigSchema.safeParse(json);
	if (!parsed.success) {
		throw new MalformedSecretError(secretName, "expected {\"auths\": {\"<host>\": {...}}}", parsed.error);
	}
	const { auths }: DockerConfigAuths = parsed.data;
	const [registryName] = Object.keys(auths).sort();
	if (registryName === undefined) throw new MalformedSecretError(secretName, "no registry in auths");

	const address = registryName.startsWith("https://") ? registryName : `https://${registryName}`;
	return { address, registryName, ...splitAuth(auths[registryName]) };
}

export async function resolveCredentials(
	reader: SecretReader,
	context: PullContext,
	logger: Logger,
): Promise<RegistryCredentials> {
	if (!context.secretName) {
		logger.debug("No imagePullSecrets, using anonymous access for", context.image);
		return anonymousCredentials();
	}

	let data: Record<string, string> | undefined;
	try {
		data = await reader.readSecret(context.namespace, context.secretName);
	} catch (e) {
		if (e instanceof TimeoutError) throw new RegistryConnectionError(`${context.namespace}/${context.secretName}`, e);
		throw new SecretNotFoundError(context.namespace, context.secretName, e);
	}

	const encoded = data?.[DOCKER_CONFIG_JSON_KEY];
	if (encoded === undefined) {
		throw new MalformedSecretError(context.secretName, `missing ${DOCKER_CONFIG_JSON_KEY} key`);
	}
	const credentials = parseDockerConfig(Buffer.from(encoded, "base64").toString("utf-8"), context.secretName);
	logger.debug(
		`Using registry ${credentials.address} from ${context.namespace}/${context.secretName}`,
		credentials.username ? "with credentials" : "without credentials",
	);
	return credentials;
}
