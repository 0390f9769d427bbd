import * as k8s from "@kubernetes/client-node";

import { TimeoutError } from "./errors";
import { SecretReader } from "./types";

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what: string): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(new TimeoutError(what, timeoutMs)), timeoutMs);
	});
	return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function isSocketTimeout(e: unknown): boolean {
	return e instanceof Error && "code" in e && (e.code == "ETIMEDOUT" || e.code == "ESOCKETTIMEDOUT");
}

/**
 * Reads Secrets through the API server. Loads kubeconfig the usual way:
 * in-cluster service account, else ~/.kube/config or $KUBECONFIG.
 */
export function createSecretReader(timeoutMs: number, kc: k8s.KubeConfig = defaultKubeConfig()): SecretReader {
	const coreV1Api = kc.makeApiClient(k8s.CoreV1Api);
	// The 0.x client takes no abort signal; the request timeout tears down the socket of a stalled read.
	coreV1Api.addInterceptor((requestOptions) => {
		requestOptions.timeout = timeoutMs;
	});
	return {
		async readSecret(namespace: string, name: string) {
			const what = `Reading secret ${namespace}/${name}`;
			const read = coreV1Api.readNamespacedSecret(name, namespace).catch((e: unknown) => {
				throw isSocketTimeout(e) ? new TimeoutError(what, timeoutMs) : e;
			});
			const { body } = await withTimeout(read, timeoutMs, what);
			return body.data;
		},
	};
}

function defaultKubeConfig() {
	const kc = new k8s.KubeConfig();
	kc.loadFromDefault();
	return kc;
}
