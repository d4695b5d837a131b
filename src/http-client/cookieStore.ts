// src/http-client/cookieStore.ts

/**
 * A single stored cookie
 */
export interface Cookie {
    name: string;
    value: string;
    domain: string;
    /** No Domain attribute was sent: only the exact origin host matches */
    hostOnly: boolean;
    path: string;
    secure: boolean;
    /** Epoch milliseconds; undefined for session cookies */
    expiresAt?: number;
}

/**
 * In-memory cookie jar fed from Set-Cookie response headers
 */
export class CookieStore {
    private cookies: Map<string, Cookie> = new Map();

    public get size(): number {
        return this.cookies.size;
    }

    /**
     * Record every Set-Cookie header of a response received from requestUrl
     */
    public setFromHeaders(setCookieHeaders: string[], requestUrl: string, now: number = Date.now()): void {
        const host = new URL(requestUrl).hostname.toLowerCase();

        setCookieHeaders.forEach((header) => {
            const cookie = this._parseSetCookie(header, host, now);
            if (!cookie) {
                return;
            }
            const storeKey = this._storeKey(cookie);
            if (cookie.expiresAt !== undefined && cookie.expiresAt <= now) {
                // an already-expired cookie is how servers delete one
                this.cookies.delete(storeKey);
                return;
            }
            this.cookies.set(storeKey, cookie);
        });
    }

    public set(cookie: Cookie): void {
        this.cookies.set(this._storeKey(cookie), cookie);
    }

    /**
     * First live cookie with the given name, whatever its domain
     */
    public get(name: string, now: number = Date.now()): Cookie | undefined {
        for (const cookie of this.cookies.values()) {
            if (cookie.name === name && !this._isExpired(cookie, now)) {
                return cookie;
            }
        }
        return undefined;
    }

    public has(name: string, now: number = Date.now()): boolean {
        return this.get(name, now) !== undefined;
    }

    /**
     * Names of every stored cookie
     */
    public keys(): string[] {
        return Array.from(new Set(Array.from(this.cookies.values()).map(c => c.name)));
    }

    public values(): Cookie[] {
        return Array.from(this.cookies.values());
    }

    public clear(): void {
        this.cookies.clear();
    }

    /**
     * Drop every cookie whose expiry has passed
     */
    public clearExpired(now: number = Date.now()): number {
        let removed = 0;
        for (const [key, cookie] of this.cookies.entries()) {
            if (this._isExpired(cookie, now)) {
                this.cookies.delete(key);
                removed++;
            }
        }
        return removed;
    }

    /**
     * Cookie header value for a request to url, or undefined when nothing matches
     */
    public headerFor(url: string, now: number = Date.now()): string | undefined {
        const target = new URL(url);
        const host = target.hostname.toLowerCase();
        const isSecure = target.protocol === 'https:';

        const pairs = Array.from(this.cookies.values())
            .filter(c => !this._isExpired(c, now))
            .filter(c => this._domainMatches(c, host))
            .filter(c => this._pathMatches(c.path, target.pathname))
            .filter(c => isSecure || !c.secure)
            .map(c => `${c.name}=${c.value}`);

        return pairs.length > 0 ? pairs.join('; ') : undefined;
    }

    /**
     * Parse one Set-Cookie header: name=value followed by attributes
     */
    private _parseSetCookie(header: string, host: string, now: number): Cookie | null {
        const [keyValuePart, ...attributes] = header.split(';');
        if (!keyValuePart) {
            return null;
        }

        const separator = keyValuePart.indexOf('=');
        if (separator <= 0) {
            return null;
        }

        // host-only by default; a Domain attribute widens it below
        const cookie: Cookie = {
            name: keyValuePart.slice(0, separator).trim(),
            value: keyValuePart.slice(separator + 1).trim(),
            domain: host,
            hostOnly: true,
            path: '/',
            secure: false,
        };

        let maxAge: number | undefined;
        let expires: number | undefined;

        for (const attribute of attributes) {
            const eq = attribute.indexOf('=');
            const attrName = (eq === -1 ? attribute : attribute.slice(0, eq)).trim().toLowerCase();
            const attrValue = eq === -1 ? '' : attribute.slice(eq + 1).trim();

            switch (attrName) {
                case 'max-age': {
                    const seconds = Number.parseInt(attrValue, 10);
                    if (!Number.isNaN(seconds)) {
                        maxAge = seconds;
                    }
                    break;
                }
                case 'expires': {
                    const parsed = Date.parse(attrValue);
                    if (!Number.isNaN(parsed)) {
                        expires = parsed;
                    }
                    break;
                }
                case 'domain':
                    if (attrValue) {
                        cookie.domain = attrValue.replace(/^\./, '').toLowerCase();
                        cookie.hostOnly = false;
                    }
                    break;
                case 'path':
                    if (attrValue.startsWith('/')) {
                        cookie.path = attrValue;
                    }
                    break;
                case 'secure':
                    cookie.secure = true;
                    break;
            }
        }

        // a host may only set cookies for itself or a parent domain
        if (!cookie.hostOnly && !this._domainMatches(cookie, host)) {
            return null;
        }

        // Max-Age wins over Expires
        if (maxAge !== undefined) {
            cookie.expiresAt = now + maxAge * 1000;
        } else if (expires !== undefined) {
            cookie.expiresAt = expires;
        }

        return cookie;
    }

    private _domainMatches(cookie: Cookie, host: string): boolean {
        if (cookie.hostOnly) {
            return host === cookie.domain;
        }
        return host === cookie.domain || host.endsWith(`.${cookie.domain}`);
    }

    /**
     * Path match: equal, or the cookie path is a prefix ending at a '/' boundary
     */
    private _pathMatches(cookiePath: string, requestPath: string): boolean {
        if (requestPath === cookiePath) {
            return true;
        }
        if (!requestPath.startsWith(cookiePath)) {
            return false;
        }
        return cookiePath.endsWith('/') || requestPath.charAt(cookiePath.length) === '/';
    }

    private _isExpired(cookie: Cookie, now: number): boolean {
        return cookie.expiresAt !== undefined && cookie.expiresAt <= now;
    }

    private _storeKey(cookie: Cookie): string {
        return `${cookie.domain};${cookie.path};${cookie.name}`;
    }
}
