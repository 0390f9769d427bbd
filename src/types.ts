export type Descriptor = {
	mediaType: string;
	size: number;
	digest: string;
};

export type ImageReference = {
	repository: string;
	tag: string;
};

// https://github.com/opencontainers/image-spec/blob/v1.0/image-index.md
// https://docs.docker.com/registry/spec/manifest-v2-2/#manifest-list
export type Index = {
	mediaType: string;
	schemaVersion: number;
	manifests: Array<IndexManifest>;
};

export type IndexManifest = Descriptor & {
	platform?: Platform;
};

export type Platform = {
	architecture: string;
	os: string;
};

export type Manifest = {
	config: Descriptor;
	mediaType: string;
	layers: Array<Descriptor>;
};

export type RegistryCredentials = {
	/** Scheme-qualified registry URL, empty when no pull secret applies. */
	address: string;
	/** The `auths` key the credentials were taken from. */
	registryName: string;
	username: string;
	password: string;
};

export type DockerAuthEntry = {
	username?: string;
	password?: string;
	auth?: string;
};

export type DockerConfigAuths = {
	auths: Record<string, DockerAuthEntry>;
};

export type ContainerImageConfig = {
	entrypoint: string[];
	cmd: string[];
};

export type PullContext = {
	namespace: string;
	secretName: string;
	image: string;
};

export enum InsecureRegistrySupport {
	NO,
	YES,
}

export type ResolverConfig = {
	allowInsecure: InsecureRegistrySupport;
	timeoutMs: number;
	platform: Platform;
	defaultRegistry: string;
};

/** Where Secret data comes from. Values are base64, as the Kubernetes API returns them. */
export interface SecretReader {
	readSecret(namespace: string, name: string): Promise<Record<string, string> | undefined>;
}
