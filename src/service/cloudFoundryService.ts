// src/service/cloudFoundryService.ts

import { z, type ZodIssue } from 'zod';
import { ConfigurationError } from '../http-client/types.js';

/** VCAP_SERVICES key listing database service instances */
export const SERVICE_LABEL = 'cloudantNoSQLDB';

const DEFAULT_PORT = 443;

const CredentialsSchema = z.object({
    host: z.string(),
    password: z.string(),
    port: z.union([z.number().int(), z.string()]).optional(),
    username: z.string(),
});

const ServiceSchema = z.object({
    name: z.string().optional(),
    credentials: CredentialsSchema,
});

type ServiceEntry = z.infer<typeof ServiceSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssue(issue: ZodIssue | undefined): string {
    if (issue && issue.code === 'invalid_type' && issue.received === 'undefined') {
        const field = issue.path[issue.path.length - 1];
        return `Invalid service: '${String(field)}' missing`;
    }
    return 'Failed to decode VCAP_SERVICES service credentials';
}

/**
 * Database credentials bound to a Cloud Foundry application.
 *
 * Accepts the VCAP_SERVICES JSON text or the already-parsed object. Without a
 * name the binding must hold exactly one database service.
 */
export class CloudFoundryService {
    public readonly host: string;
    public readonly name?: string;
    public readonly username: string;
    public readonly password: string;
    private readonly _port: number | string;

    constructor(vcapServices: string | Record<string, unknown>, name?: string) {
        const service = CloudFoundryService._select(CloudFoundryService._decode(vcapServices), name);

        this.host = service.credentials.host;
        this.name = service.name;
        this.username = service.credentials.username;
        this.password = service.credentials.password;
        this._port = service.credentials.port ?? DEFAULT_PORT;
    }

    /**
     * Read the binding from the VCAP_SERVICES environment variable
     */
    public static fromEnv(name?: string, env: NodeJS.ProcessEnv = process.env): CloudFoundryService {
        const raw = env['VCAP_SERVICES'];
        if (!raw) {
            throw new ConfigurationError('Missing VCAP_SERVICES environment variable');
        }
        return new CloudFoundryService(raw, name);
    }

    public get port(): string {
        return String(this._port);
    }

    public get url(): string {
        return `https://${this.host}:${this.port}`;
    }

    private static _decode(vcapServices: string | Record<string, unknown>): Record<string, unknown> {
        let services: unknown = vcapServices;
        if (typeof vcapServices === 'string') {
            try {
                services = JSON.parse(vcapServices);
            } catch (error) {
                throw new ConfigurationError('Failed to decode VCAP_SERVICES JSON', error);
            }
        }
        if (!isRecord(services)) {
            throw new ConfigurationError('Failed to decode VCAP_SERVICES service credentials');
        }
        return services;
    }

    private static _select(services: Record<string, unknown>, name?: string): ServiceEntry {
        const candidates = services[SERVICE_LABEL] ?? [];
        if (!Array.isArray(candidates)) {
            throw new ConfigurationError('Failed to decode VCAP_SERVICES service credentials');
        }

        // the sole service is used when no name is given
        const useFirst = name === undefined && candidates.length === 1;
        const match: unknown = candidates.find(
            (candidate: unknown) =>
                useFirst || (name !== undefined && isRecord(candidate) && candidate['name'] === name)
        );
        if (match === undefined) {
            throw new ConfigurationError('Missing service in VCAP_SERVICES');
        }

        const parsed = ServiceSchema.safeParse(match);
        if (!parsed.success) {
            throw new ConfigurationError(describeIssue(parsed.error.issues[0]), parsed.error);
        }
        return parsed.data;
    }
}
