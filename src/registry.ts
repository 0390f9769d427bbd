import { z } from "zod";

import { BlobDownloadError, DecodeError, ManifestNotFoundError, RegistryConnectionError, TimeoutError } from "./errors";
import { Logger } from "./logger";
import { ContainerImageConfig, Index, IndexManifest, InsecureRegistrySupport, Manifest, Platform } from "./types";
import { DockerV2, OCI } from "./MIMETypes";
import { parseWwwAuthHeader } from "./utils";
import { HttpResponse, Transport, basicAuth, buildHeaders, dlJson, get, isOk, toError } from "./httpRequest";

export type RegistryOptions = {
	allowInsecure: InsecureRegistrySupport;
	timeoutMs: number;
	platform: Platform;
	logger: Logger;
};

export type Registry = {
	fetchManifest: (repository: string, tag: string) => Promise<Manifest>;
	downloadBlob: (repository: string, digest: string) => Promise<Buffer>;
	registryBaseUrl: string;
};

const ACCEPT_MANIFESTS = `${OCI.index}, ${OCI.manifest}, ${DockerV2.index}, ${DockerV2.manifest}`;

const DescriptorSchema = z.object({
	mediaType: z.string().default(""),
	size: z.number().default(0),
	digest: z.string(),
});

const IndexSchema = z.object({
	mediaType: z.string().default(""),
	schemaVersion: z.number().default(2),
	manifests: z.array(
		DescriptorSchema.extend({
			platform: z.object({ architecture: z.string(), os: z.string() }).optional(),
		}),
	),
});

const ManifestSchema = z.object({
	mediaType: z.string().default(""),
	config: DescriptorSchema,
	layers: z.array(DescriptorSchema).default([]),
});

const TokenResponseSchema = z.union([z.object({ token: z.string() }), z.object({ access_token: z.string() })]);

const ImageConfigBlobSchema = z.object({
	config: z
		.object({
			Cmd: z.array(z.string()).nullish(),
			Entrypoint: z.array(z.string()).nullish(),
		})
		.nullish(),
});

/** `https://host`, `https://host/` and `https://host/v2/` all give `https://host/v2/`. */
export function toRegistryBaseUrl(registryAddress: string): string {
	return registryAddress.replace(/\/+$/, "").replace(/\/v2$/, "") + "/v2/";
}

export function decodeImageConfig(blob: Buffer): ContainerImageConfig {
	let json: unknown;
	try {
		json = JSON.parse(blob.toString("utf-8"));
	} catch (e) {
		throw new DecodeError("invalid JSON", e);
	}
	const parsed = ImageConfigBlobSchema.safeParse(json);
	if (!parsed.success) throw new DecodeError("unexpected shape", parsed.error);
	const config = parsed.data.config;
	return {
		entrypoint: config?.Entrypoint ?? [],
		cmd: config?.Cmd ?? [],
	};
}

export function pickManifest(manifests: IndexManifest[], preferredPlatform: Platform, logger: Logger): IndexManifest {
	const matchingArchitectures = manifests.filter((m) => m.platform?.architecture === preferredPlatform.architecture);
	const exact = matchingArchitectures.find((m) => m.platform?.os === preferredPlatform.os);
	if (exact) return exact;

	if (matchingArchitectures.length >= 1) {
		const matchingArch = matchingArchitectures[0];
		logger.info(`[WARN] Preferred OS '${preferredPlatform.os}' not available.`);
		logger.info("[WARN] Using closest available manifest:", JSON.stringify(matchingArch.platform));
		return matchingArch;
	}

	logger.error(`No image matching requested architecture: '${preferredPlatform.architecture}'`);
	logger.error("Available platforms:", JSON.stringify(manifests.map((m) => m.platform)));
	throw new Error("No image matching requested architecture");
}

/**
 * Opens a registry session: checks `/v2/` and negotiates auth. Tokens obtained
 * here belong to this session only.
 */
export async function createRegistry(
	registryAddress: string,
	username: string,
	password: string,
	options: RegistryOptions,
): Promise<Registry> {
	const registryBaseUrl = toRegistryBaseUrl(registryAddress);
	const { logger, platform } = options;
	const transport: Transport = { allowInsecure: options.allowInsecure, timeoutMs: options.timeoutMs, logger };
	const basic = basicAuth(username, password);
	let authorization = basic;

	async function fetchToken(challenge: Record<string, string>): Promise<string> {
		const url = new URL(challenge.realm);
		if (challenge.service) url.searchParams.set("service", challenge.service);
		if (challenge.scope) url.searchParams.set("scope", challenge.scope);
		const parsed = TokenResponseSchema.safeParse(
			await dlJson(url.toString(), buildHeaders("application/json", basic), transport),
		);
		if (!parsed.success) throw new Error(`No token in response from ${challenge.realm}`);
		return "Bearer " + ("token" in parsed.data ? parsed.data.token : parsed.data.access_token);
	}

	async function authorizedGet(url: string, accept: string): Promise<HttpResponse> {
		const res = await get(url, buildHeaders(accept, authorization), transport);
		if (res.statusCode != 401) return res;

		const { scheme, params } = parseWwwAuthHeader(res.headers["www-authenticate"] ?? "");
		if (scheme == "bearer" && params.realm) {
			logger.debug("Requesting token from", params.realm, params.scope ?? "");
			authorization = await fetchToken(params);
		} else if (scheme == "basic" && basic && authorization != basic) {
			authorization = basic;
		} else {
			return res;
		}
		return get(url, buildHeaders(accept, authorization), transport);
	}

	async function dlManifest(repository: string, reference: string): Promise<Manifest> {
		const res = await authorizedGet(`${registryBaseUrl}${repository}/manifests/${reference}`, ACCEPT_MANIFESTS);
		if (!isOk(res.statusCode)) throw toError(res);
		const parsed = z.union([IndexSchema, ManifestSchema]).safeParse(JSON.parse(res.body.toString("utf-8")));
		if (!parsed.success) throw new Error(`Unsupported manifest for ${repository}:${reference}`);

		// We've received an OCI Index or Docker Manifest List and need to find which manifest we want
		if ("manifests" in parsed.data) {
			const index: Index = parsed.data;
			const adequateManifest = pickManifest(index.manifests, platform, logger);
			return dlManifest(repository, adequateManifest.digest);
		}
		return parsed.data;
	}

	async function fetchManifest(repository: string, tag: string): Promise<Manifest> {
		logger.debug("Downloading manifest...", `${repository}:${tag}`);
		try {
			return await dlManifest(repository, tag);
		} catch (e) {
			if (e instanceof TimeoutError) throw new RegistryConnectionError(registryAddress, e);
			throw new ManifestNotFoundError(repository, tag, e);
		}
	}

	async function downloadBlob(repository: string, digest: string): Promise<Buffer> {
		logger.debug("Downloading blob...", digest);
		try {
			const res = await authorizedGet(`${registryBaseUrl}${repository}/blobs/${digest}`, "*/*");
			if (!isOk(res.statusCode)) throw toError(res);
			return res.body;
		} catch (e) {
			if (e instanceof TimeoutError) throw new RegistryConnectionError(registryAddress, e);
			throw new BlobDownloadError(repository, digest, e);
		}
	}

	try {
		const res = await authorizedGet(registryBaseUrl, "application/json");
		if (!isOk(res.statusCode)) throw toError(res);
	} catch (e) {
		throw new RegistryConnectionError(registryAddress, e);
	}

	return {
		fetchManifest,
		downloadBlob,
		registryBaseUrl,
	};
}

export async function fetchEntrypointCmd(
	registryAddress: string,
	username: string,
	password: string,
	repository: string,
	tag: string,
	options: RegistryOptions,
): Promise<ContainerImageConfig> {
	const registry = await createRegistry(registryAddress, username, password, options);
	const manifest = await registry.fetchManifest(repository, tag);
	const blob = await registry.downloadBlob(repository, manifest.config.digest);
	return decodeImageConfig(blob);
}
