import { z } from 'zod';

export class HttpError extends Error {
    constructor(readonly status: number, message: string) {
        super(message);
        this.name = 'HttpError';
    }
}

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function describeIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

/** GETs `url` and validates the JSON body against `schema`. */
export async function getJson<T>(url: string, schema: Schema<T>): Promise<T> {
    const res = await fetch(url, { headers: { Accept: 'application/json' } });
    if (!res.ok) {
        throw new HttpError(res.status, `Request to ${url} failed: ${res.status}`);
    }
    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
        throw new Error(`Unexpected response from ${url}: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}

const RpcEnvelopeSchema = z.object({
    result: z.unknown().optional(),
    error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
});

/** JSON-RPC 2.0 call whose `result` is validated against `schema`. */
export async function rpcCall<T>(url: string, method: string, params: unknown[], schema: Schema<T>): Promise<T> {
    const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
            jsonrpc: '2.0',
            id: 1,
            method,
            params,
        }),
    });
    if (!res.ok) {
        throw new HttpError(res.status, `RPC request failed: ${res.status}`);
    }

    const envelope = RpcEnvelopeSchema.parse(await res.json());
    if (envelope.error) {
        throw new Error(envelope.error.message ?? 'RPC error');
    }

    const parsed = schema.safeParse(envelope.result);
    if (!parsed.success) {
        throw new Error(`Unexpected ${method} result: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}
