import { describe, expect, it, vi } from "vitest";

import { DOCKER_CONFIG_JSON_KEY, parseDockerConfig, pickPullSecret, resolveCredentials } from "./credentials";
import { MalformedSecretError, RegistryConnectionError, SecretNotFoundError } from "./errors";
import { withTimeout } from "./kubernetes";
import { silentLogger } from "./logger";
import { createMockSecretReader } from "./test-utils/mocks";
import { SecretReader } from "./types";

const context = { namespace: "team-a", secretName: "regcred", image: "myregistry.io/app:2.0" };

describe("resolveCredentials", () => {
	it("derives an https address from the registry host", async () => {
		const reader = createMockSecretReader({
			"team-a/regcred": { auths: { "myregistry.io": { username: "u", password: "p" } } },
		});
		expect(await resolveCredentials(reader, context, silentLogger)).toEqual({
			address: "https://myregistry.io",
			registryName: "myregistry.io",
			username: "u",
			password: "p",
		});
	});

	it("uses an https host verbatim", async () => {
		const reader = createMockSecretReader({
			"team-a/regcred": { auths: { "https://myregistry.io": { username: "u", password: "p" } } },
		});
		const credentials = await resolveCredentials(reader, context, silentLogger);
		expect(credentials.address).toBe("https://myregistry.io");
		expect(credentials.registryName).toBe("https://myregistry.io");
	});

	it("returns anonymous credentials without reading a secret when the pod has none", async () => {
		const readSecret = vi.fn<SecretReader["readSecret"]>();
		const credentials = await resolveCredentials({ readSecret }, { ...context, secretName: "" }, silentLogger);
		expect(credentials).toEqual({ address: "", registryName: "", username: "", password: "" });
		expect(readSecret).not.toHaveBeenCalled();
	});

	it("reports a secret that cannot be read", async () => {
		const reader = createMockSecretReader({});
		const result = resolveCredentials(reader, context, silentLogger);
		await expect(result).rejects.toBeInstanceOf(SecretNotFoundError);
		await expect(result).rejects.toThrow('Cannot read imagePullSecret team-a/regcred: secrets "regcred" not found');
	});

	it("reports a secret read that times out as a connection error", async () => {
		const reader: SecretReader = {
			readSecret: (namespace, name) =>
				withTimeout(new Promise<undefined>(() => undefined), 20, `Reading secret ${namespace}/${name}`),
		};
		const result = resolveCredentials(reader, context, silentLogger);
		await expect(result).rejects.toBeInstanceOf(RegistryConnectionError);
		await expect(result).rejects.toThrow(
			"Cannot create client for registry team-a/regcred: Reading secret team-a/regcred timed out after 20 ms",
		);
	});

	it("reports a secret without a docker config key", async () => {
		const reader: SecretReader = { readSecret: async () => ({ ".dockercfg": "e30=" }) };
		await expect(resolveCredentials(reader, context, silentLogger)).rejects.toThrow(
			`Cannot parse docker configuration from imagePullSecret regcred: missing ${DOCKER_CONFIG_JSON_KEY} key`,
		);
	});

	it("reports a secret without data", async () => {
		const reader: SecretReader = { readSecret: async () => undefined };
		await expect(resolveCredentials(reader, context, silentLogger)).rejects.toBeInstanceOf(MalformedSecretError);
	});
});

describe("parseDockerConfig", () => {
	it("rejects invalid JSON and unexpected shapes", () => {
		expect(() => parseDockerConfig("{", "regcred")).toThrow(
			"Cannot parse docker configuration from imagePullSecret regcred: invalid JSON",
		);
		expect(() => parseDockerConfig('{"credHelpers":{}}', "regcred")).toThrow(MalformedSecretError);
		expect(() => parseDockerConfig('{"auths":{}}', "regcred")).toThrow(
			"Cannot parse docker configuration from imagePullSecret regcred: no registry in auths",
		);
	});

	it("picks the smallest host when several are present", () => {
		const payload = JSON.stringify({
			auths: {
				"zeta.example.io": { username: "z", password: "zz" },
				"alpha.example.io": { username: "a", password: "aa" },
			},
		});
		expect(parseDockerConfig(payload, "regcred")).toEqual({
			address: "https://alpha.example.io",
			registryName: "alpha.example.io",
			username: "a",
			password: "aa",
		});
	});

	it("falls back to the combined auth field", () => {
		const auth = Buffer.from("robot:pa:ss").toString("base64");
		const credentials = parseDockerConfig(JSON.stringify({ auths: { "myregistry.io": { auth } } }), "regcred");
		expect(credentials.username).toBe("robot");
		expect(credentials.password).toBe("pa:ss");
	});
});

describe("pickPullSecret", () => {
	it("takes the first pull secret only", () => {
		const podSpec = { containers: [], imagePullSecrets: [{ name: "first" }, { name: "second" }] };
		expect(pickPullSecret(podSpec, silentLogger)).toBe("first");
	});

	it("returns an empty name when the pod has no pull secrets", () => {
		expect(pickPullSecret({ containers: [] }, silentLogger)).toBe("");
		expect(pickPullSecret({ containers: [], imagePullSecrets: [] }, silentLogger)).toBe("");
	});
});
