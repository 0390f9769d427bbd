import { afterEach, describe, expect, it } from "vitest";

import { ManifestNotFoundError } from "./errors";
import { silentLogger } from "./logger";
import { getEntrypointCmd } from "./resolver";
import { FakeRegistry, createMockSecretReader, sendJson, startFakeRegistry } from "./test-utils/mocks";
import { InsecureRegistrySupport, ResolverConfig } from "./types";

const DIGEST = "sha256:5eed";

let registry: FakeRegistry | undefined;

afterEach(async () => {
	await registry?.close();
	registry = undefined;
});

function configFor(address: string): ResolverConfig {
	return {
		allowInsecure: InsecureRegistrySupport.NO,
		timeoutMs: 2000,
		platform: { os: "linux", architecture: "amd64" },
		defaultRegistry: `${address}/`,
	};
}

describe("getEntrypointCmd against a registry", () => {
	it("resolves an official image from the default registry", async () => {
		registry = await startFakeRegistry({
			"/v2/": (_req, res) => sendJson(res, 200, {}),
			"/v2/library/nginx/manifests/1.19": (_req, res) =>
				sendJson(res, 200, {
					schemaVersion: 2,
					mediaType: "application/vnd.docker.distribution.manifest.v2+json",
					config: { mediaType: "application/vnd.docker.container.image.v1+json", size: 64, digest: DIGEST },
					layers: [],
				}),
			[`/v2/library/nginx/blobs/${DIGEST}`]: (_req, res) =>
				sendJson(res, 200, { config: { Cmd: ["nginx", "-g", "daemon off;"], Entrypoint: [] } }),
		});
		const container = { name: "web", image: "nginx:1.19" };

		const result = await getEntrypointCmd(
			"team-a",
			container,
			{ containers: [container] },
			{ secrets: createMockSecretReader(), config: configFor(registry.address), logger: silentLogger },
		);

		expect(result).toEqual({ entrypoint: [], cmd: ["nginx", "-g", "daemon off;"] });
	});

	it("rejects with ManifestNotFoundError and no result when the tag is unknown", async () => {
		registry = await startFakeRegistry({ "/v2/": (_req, res) => sendJson(res, 200, {}) });
		const container = { name: "web", image: "nginx:0.0" };

		const result = getEntrypointCmd(
			"team-a",
			container,
			{ containers: [container] },
			{ secrets: createMockSecretReader(), config: configFor(registry.address) },
		);

		await expect(result).rejects.toBeInstanceOf(ManifestNotFoundError);
		expect(registry.requests.map((r) => r.path)).toEqual(["/v2/", "/v2/library/nginx/manifests/0.0"]);
	});
});
