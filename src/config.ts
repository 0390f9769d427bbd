import { z } from "zod";

import { InsecureRegistrySupport, ResolverConfig } from "./types";
import { getPreferredPlatform } from "./utils";

export const DEFAULT_DOCKER_REGISTRY = "https://registry-1.docker.io/";
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_PLATFORM = "linux/amd64";

const EnvSchema = z.object({
	REGISTRY_SKIP_VERIFY: z.string().optional(),
	REGISTRY_TIMEOUT_MS: z
		.string()
		.regex(/^[1-9][0-9]*$/, "must be a positive integer")
		.transform(Number)
		.optional(),
	REGISTRY_PLATFORM: z.string().min(1).optional(),
	DEFAULT_REGISTRY: z.string().url().optional(),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new Error(`Invalid environment variable ${issue.path.join(".")}: ${issue.message}`);
	}
	const vars = parsed.data;
	return {
		allowInsecure: vars.REGISTRY_SKIP_VERIFY === "true" ? InsecureRegistrySupport.YES : InsecureRegistrySupport.NO,
		timeoutMs: vars.REGISTRY_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
		platform: getPreferredPlatform(vars.REGISTRY_PLATFORM ?? DEFAULT_PLATFORM),
		defaultRegistry: vars.DEFAULT_REGISTRY ?? DEFAULT_DOCKER_REGISTRY,
	};
}
