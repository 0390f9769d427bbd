export class ResolutionError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Image reference has no explicit tag. No implicit `latest` is assumed. */
export class MissingTagError extends ResolutionError {
	constructor(readonly image: string) {
		super(`Cannot find tag for image ${image}`);
	}
}

export class SecretNotFoundError extends ResolutionError {
	constructor(
		readonly namespace: string,
		readonly secretName: string,
		cause?: unknown,
	) {
		super(`Cannot read imagePullSecret ${namespace}/${secretName}: ${describeCause(cause)}`, { cause });
	}
}

export class MalformedSecretError extends ResolutionError {
	constructor(
		readonly secretName: string,
		reason: string,
		cause?: unknown,
	) {
		super(`Cannot parse docker configuration from imagePullSecret ${secretName}: ${reason}`, { cause });
	}
}

export class RegistryConnectionError extends ResolutionError {
	constructor(
		readonly registryAddress: string,
		cause?: unknown,
	) {
		super(`Cannot create client for registry ${registryAddress}: ${describeCause(cause)}`, { cause });
	}
}

export class ManifestNotFoundError extends ResolutionError {
	constructor(
		readonly repository: string,
		readonly tag: string,
		cause?: unknown,
	) {
		super(`Cannot download manifest for image ${repository}:${tag}: ${describeCause(cause)}`, { cause });
	}
}

export class BlobDownloadError extends ResolutionError {
	constructor(
		readonly repository: string,
		readonly digest: string,
		cause?: unknown,
	) {
		super(`Cannot download blob ${digest} of ${repository}: ${describeCause(cause)}`, { cause });
	}
}

/** Config blob is not JSON of the shape `{ config: { Cmd, Entrypoint } }`. */
export class DecodeError extends ResolutionError {
	constructor(reason: string, cause?: unknown) {
		super(`Cannot decode image config: ${reason}`, { cause });
	}
}

/** A request to the registry or API server took longer than the configured timeout. */
export class TimeoutError extends Error {
	constructor(
		readonly what: string,
		readonly timeoutMs: number,
	) {
		super(`${what} timed out after ${timeoutMs} ms`);
		this.name = "TimeoutError";
	}
}

export function isResolutionError(error: unknown): error is ResolutionError {
	return error instanceof ResolutionError;
}

export function describeCause(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (error === undefined) return "unknown error";
	return String(error);
}
