import { describe, expect, it } from "vitest";

import { DEFAULT_DOCKER_REGISTRY, DEFAULT_TIMEOUT_MS, loadConfig } from "./config";
import { InsecureRegistrySupport } from "./types";

describe("loadConfig", () => {
	it("uses defaults for an empty environment", () => {
		expect(loadConfig({})).toEqual({
			allowInsecure: InsecureRegistrySupport.NO,
			timeoutMs: DEFAULT_TIMEOUT_MS,
			platform: { os: "linux", architecture: "amd64" },
			defaultRegistry: DEFAULT_DOCKER_REGISTRY,
		});
	});

	it("only bypasses TLS verification for the literal true", () => {
		expect(loadConfig({ REGISTRY_SKIP_VERIFY: "true" }).allowInsecure).toBe(InsecureRegistrySupport.YES);
		expect(loadConfig({ REGISTRY_SKIP_VERIFY: "1" }).allowInsecure).toBe(InsecureRegistrySupport.NO);
		expect(loadConfig({ REGISTRY_SKIP_VERIFY: "TRUE" }).allowInsecure).toBe(InsecureRegistrySupport.NO);
	});

	it("reads timeout, platform and default registry", () => {
		const config = loadConfig({
			REGISTRY_TIMEOUT_MS: "2500",
			REGISTRY_PLATFORM: "arm64",
			DEFAULT_REGISTRY: "https://mirror.example.io/",
		});
		expect(config.timeoutMs).toBe(2500);
		expect(config.platform).toEqual({ os: "linux", architecture: "arm64" });
		expect(config.defaultRegistry).toBe("https://mirror.example.io/");
	});

	it("rejects a non-numeric timeout", () => {
		expect(() => loadConfig({ REGISTRY_TIMEOUT_MS: "soon" })).toThrow(
			"Invalid environment variable REGISTRY_TIMEOUT_MS: must be a positive integer",
		);
	});
});
