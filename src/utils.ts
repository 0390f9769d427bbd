import { Platform } from "./types";

export function getPreferredPlatform(platform: string): Platform {
	// We assume the input is similar to docker which accepts `<os>/<arch>` and `<arch>`
	let os = "linux";
	let arch: string;

	const input = platform.split("/");
	if (input.length == 1) {
		arch = input[0];
	} else if (input.length == 2) {
		os = input[0];
		arch = input[1];
	} else {
		throw new Error(`Invalid platform ${platform}. Should be on format <os>/<arch> or <arch>`);
	}

	// Mapping from Node's `process.arch` and Golang's `$GOARCH` to Golang's `$GOARCH` (incomplete)
	// https://go.dev/doc/install/source#environment
	const ARCH_MAPPING = {
		ia32: "386",
		"386": "386",
		x64: "amd64",
		amd64: "amd64",
		arm: "arm",
		arm64: "arm64",
		ppc64le: "ppc64le",
		s390x: "s390x",
	} as const;

	const targetArch = Object.entries(ARCH_MAPPING).find(([k]) => k == arch)?.[1];
	if (targetArch == undefined) {
		throw new Error(`Architecture ${arch} not supported. Supported architectures are '${Object.keys(ARCH_MAPPING)}'.`);
	}
	if (!os) throw new Error(`Invalid platform ${platform}. OS is empty`);
	return {
		os,
		architecture: targetArch,
	};
}

/**
 * Parses the directives of a `WWW-Authenticate` challenge, e.g.
 * `Bearer realm="https://auth.example.io/token",service="registry.example.io"`.
 */
export function parseWwwAuthHeader(header: string): { scheme: string; params: Record<string, string> } {
	const trimmed = header.trim();
	const space = trimmed.indexOf(" ");
	const scheme = (space == -1 ? trimmed : trimmed.slice(0, space)).toLowerCase();
	const params: Record<string, string> = {};
	if (space == -1) return { scheme, params };
	for (const match of trimmed.slice(space + 1).matchAll(/([A-Za-z_]+)="([^"]*)"/g)) {
		params[match[1]] = match[2];
	}
	return { scheme, params };
}
