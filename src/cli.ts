#!/usr/bin/env node

import { Command } from "commander";
import * as fse from "fs-extra";
import { V1Container, V1PodSpec } from "@kubernetes/client-node";

import { loadConfig } from "./config";
import { createSecretReader } from "./kubernetes";
import logger from "./logger";
import { getEntrypointCmd } from "./resolver";
import { InsecureRegistrySupport } from "./types";
import { getPreferredPlatform } from "./utils";
import { VERSION } from "./version";

const program = new Command();

program
	.name("image-entrypoint")
	.description("Print the entrypoint and cmd of a container image, authenticating with a pod's imagePullSecret.")
	.option("--image <registry/name:tag>", "Image to inspect (ignored with --podFile)")
	.option("--namespace <namespace>", "Namespace of the pull secret", "default")
	.option("--pullSecret <name>", "Name of the imagePullSecret to authenticate with (ignored with --podFile)")
	.option("--podFile <path>", "Pod or PodSpec JSON file to take the image and imagePullSecrets from")
	.option("--container <name>", "Container in --podFile to inspect - default, the first one")
	.option("--platform <platform>", "Platform to pick from multi-platform images, e.g. linux/amd64 or arm64")
	.option("--timeout <ms>", "Timeout for each registry and API server request in milliseconds")
	.option("--allowInsecureRegistries", "Allow insecure registries (with self-signed/untrusted cert)")
	.option("--verbose", "Verbose logging")
	.version(VERSION, "--version", "Get image-entrypoint version");

type CliOptions = {
	image?: string;
	namespace: string;
	pullSecret?: string;
	podFile?: string;
	container?: string;
	platform?: string;
	timeout?: string;
	allowInsecureRegistries?: boolean;
	verbose?: boolean;
};

function exitWithErrorIf(check: boolean, error: string) {
	if (check) {
		logger.error("ERROR: " + error);
		program.help({ error: true });
	}
}

function hasSpec(value: unknown): value is { spec: unknown } {
	return typeof value == "object" && value !== null && "spec" in value;
}

function isPodSpec(value: unknown): value is V1PodSpec {
	return typeof value == "object" && value !== null && "containers" in value && Array.isArray(value.containers);
}

async function loadPodSpec(options: CliOptions): Promise<{ podSpec: V1PodSpec; container: V1Container }> {
	if (!options.podFile) {
		const podSpec: V1PodSpec = {
			containers: [{ name: "main", image: options.image }],
			imagePullSecrets: options.pullSecret ? [{ name: options.pullSecret }] : [],
		};
		return { podSpec, container: podSpec.containers[0] };
	}
	const json: unknown = await fse.readJson(options.podFile);
	const podSpec = hasSpec(json) ? json.spec : json;
	if (!isPodSpec(podSpec)) throw new Error(`${options.podFile} is neither a Pod nor a PodSpec`);
	const containers = podSpec.containers;
	const container = options.container ? containers.find((c) => c.name == options.container) : containers[0];
	if (!container) throw new Error(`No container ${options.container ?? ""} in ${options.podFile}`);
	return { podSpec, container };
}

async function run(options: CliOptions) {
	const config = loadConfig();
	if (options.allowInsecureRegistries) config.allowInsecure = InsecureRegistrySupport.YES;
	if (options.platform) config.platform = getPreferredPlatform(options.platform);
	if (options.timeout) config.timeoutMs = Number(options.timeout);

	const { podSpec, container } = await loadPodSpec(options);
	const result = await getEntrypointCmd(options.namespace, container, podSpec, {
		secrets: createSecretReader(config.timeoutMs),
		config,
		logger,
	});
	process.stdout.write(JSON.stringify(result) + "\n");
}

program.parse(process.argv);
const options = program.opts<CliOptions>();

if (options.verbose) logger.enableDebug();

exitWithErrorIf(!options.podFile && !options.image, "Either --image or --podFile must be specified");
exitWithErrorIf(
	!!options.timeout && !/^[1-9][0-9]*$/.test(options.timeout),
	"--timeout must be a positive number of milliseconds",
);

logger.debug("Running with options:", options);

run(options)
	.then(() => {
		process.exit(0);
	})
	.catch((error) => {
		logger.error(error instanceof Error ? error.message : error);
		process.exit(1);
	});
