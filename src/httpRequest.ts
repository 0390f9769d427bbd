import * as https from "https";
import * as http from "http";

import { TimeoutError } from "./errors";
import { Logger } from "./logger";
import { InsecureRegistrySupport } from "./types";
import { IncomingHttpHeaders, OutgoingHttpHeaders } from "http";

export const redirectCodes = [308, 307, 303, 302, 301];
const MAX_REDIRECTS = 10;

export type Transport = {
	allowInsecure: InsecureRegistrySupport;
	timeoutMs: number;
	logger: Logger;
};

export type HttpResponse = {
	statusCode: number;
	statusMessage: string;
	headers: IncomingHttpHeaders;
	body: Buffer;
};

export class HttpStatusError extends Error {
	constructor(
		readonly statusCode: number,
		statusMessage: string,
	) {
		super(`Unexpected HTTP status ${statusCode} : ${statusMessage}`);
		this.name = "HttpStatusError";
	}
}

export function isOk(httpStatus: number) {
	return httpStatus >= 200 && httpStatus < 300;
}
type HttpMethod = "GET";
export function createHttpOptions(method: HttpMethod, url: string, headers: OutgoingHttpHeaders): https.RequestOptions {
	const { protocol, hostname, port, pathname, search } = new URL(url);
	return {
		protocol,
		hostname,
		port: port || undefined,
		path: pathname + search,
		method,
		headers,
	};
}

export function buildHeaders(accept: string, auth: string): OutgoingHttpHeaders {
	const headers: OutgoingHttpHeaders = { accept: accept };
	if (auth) headers.authorization = auth;
	return headers;
}

export function basicAuth(username: string, password: string): string {
	if (!username) return "";
	return "Basic " + Buffer.from(`${username}:${password}`).toString("base64");
}

export function request(options: https.RequestOptions, transport: Transport): Promise<HttpResponse> {
	if (transport.allowInsecure == InsecureRegistrySupport.YES) options.rejectUnauthorized = false;
	return new Promise((resolve, reject) => {
		const req = (options.protocol == "https:" ? https : http).request(options, (res) => {
			waitForResponseEnd(
				res,
				(body) =>
					resolve({
						statusCode: res.statusCode ?? 0,
						statusMessage: res.statusMessage ?? "",
						headers: res.headers,
						body,
					}),
				reject,
			);
		});
		req.setTimeout(transport.timeoutMs, () => {
			req.destroy(new TimeoutError("Request", transport.timeoutMs));
		});
		req.on("error", (e) => {
			transport.logger.debug("ERROR: " + e, options.method, options.path);
			reject(e);
		});
		req.end();
	});
}

export function toError(res: HttpResponse) {
	return new HttpStatusError(res.statusCode, res.statusMessage);
}

export function waitForResponseEnd(
	res: http.IncomingMessage,
	cb: (data: Buffer) => void,
	onError: (e: Error) => void,
) {
	const data: Buffer[] = [];
	res.on("data", (d: Buffer) => data.push(d));
	res.on("end", () => cb(Buffer.concat(data)));
	res.on("error", onError);
}

/**
 * GET following redirects. The authorization header is only sent to the host
 * the request started on, since blob redirects usually point at signed storage URLs.
 */
export async function get(
	uri: string,
	headers: OutgoingHttpHeaders,
	transport: Transport,
	count = 0,
): Promise<HttpResponse> {
	transport.logger.debug("GET", uri);
	const res = await request(createHttpOptions("GET", uri, headers), transport);
	if (!redirectCodes.includes(res.statusCode)) return res;
	if (count >= MAX_REDIRECTS) throw new Error("Too many redirects for " + uri);
	const location = res.headers.location;
	if (!location) throw new Error("Redirect, but missing location header");
	const next = new URL(location, uri);
	const nextHeaders = { ...headers };
	if (next.host != new URL(uri).host) delete nextHeaders.authorization;
	return get(next.toString(), nextHeaders, transport, count + 1);
}

export async function dl(uri: string, headers: OutgoingHttpHeaders, transport: Transport): Promise<Buffer> {
	const res = await get(uri, headers, transport);
	transport.logger.debug(res.statusCode, res.statusMessage, res.headers["content-type"], res.headers["content-length"]);
	if (!isOk(res.statusCode)) throw toError(res);
	return res.body;
}

export async function dlJson(uri: string, headers: OutgoingHttpHeaders, transport: Transport): Promise<unknown> {
	const data = await dl(uri, headers, transport);
	return JSON.parse(data.toString("utf-8"));
}
