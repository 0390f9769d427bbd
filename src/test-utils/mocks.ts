import * as fse from "fs-extra";
import * as http from "http";
import * as https from "https";
import * as path from "path";

import { DOCKER_CONFIG_JSON_KEY } from "../credentials";
import { SecretReader } from "../types";

export type RecordedRequest = {
	path: string;
	authorization?: string;
	accept?: string;
};

type Route = (req: http.IncomingMessage, res: http.ServerResponse, url: URL) => void;

export type FakeRegistry = {
	address: string;
	requests: RecordedRequest[];
	close: () => Promise<void>;
};

export function sendJson(res: http.ServerResponse, status: number, body: unknown, headers: http.OutgoingHttpHeaders = {}) {
	res.writeHead(status, { "content-type": "application/json", ...headers });
	res.end(JSON.stringify(body));
}

/** Throwaway self-signed key and certificate for 127.0.0.1. */
function selfSignedTls(): https.ServerOptions {
	const fixtures = path.join(__dirname, "fixtures");
	return {
		key: fse.readFileSync(path.join(fixtures, "self-signed-key.pem")),
		cert: fse.readFileSync(path.join(fixtures, "self-signed-cert.pem")),
	};
}

/**
 * Registry stand-in on the loopback interface. Routes are keyed by path,
 * without the query string; unknown paths answer 404. With `tls` it speaks
 * HTTPS using a self-signed certificate.
 */
export async function startFakeRegistry(
	routes: Record<string, Route>,
	{ tls = false }: { tls?: boolean } = {},
): Promise<FakeRegistry> {
	const requests: RecordedRequest[] = [];
	const handler = (req: http.IncomingMessage, res: http.ServerResponse) => {
		const url = new URL(req.url ?? "/", "http://localhost");
		requests.push({ path: url.pathname, authorization: req.headers.authorization, accept: req.headers.accept });
		const route = routes[url.pathname];
		if (!route) return sendJson(res, 404, { errors: [{ code: "NOT_FOUND" }] });
		route(req, res, url);
	};
	const server = tls ? https.createServer(selfSignedTls(), handler) : http.createServer(handler);
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	const address = server.address();
	if (address === null || typeof address == "string") throw new Error("Fake registry is not listening on TCP");

	return {
		address: `${tls ? "https" : "http"}://127.0.0.1:${address.port}`,
		requests,
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.closeAllConnections();
				server.close((e) => (e ? reject(e) : resolve()));
			}),
	};
}

/** Secrets keyed by `namespace/name`, holding a docker config JSON payload. */
export function createMockSecretReader(dockerConfigs: Record<string, unknown> = {}): SecretReader {
	return {
		async readSecret(namespace: string, name: string) {
			const key = `${namespace}/${name}`;
			if (!(key in dockerConfigs)) throw new Error(`secrets "${name}" not found`);
			const payload = dockerConfigs[key];
			const raw = typeof payload == "string" ? payload : JSON.stringify(payload);
			return { [DOCKER_CONFIG_JSON_KEY]: Buffer.from(raw).toString("base64") };
		},
	};
}
