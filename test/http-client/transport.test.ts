// test/http-client/transport.test.ts
import { createFakeServer } from '../helpers/fakeServer';
import { rejectionOf } from '../helpers/errors';

const BASE = 'https://db.example.com';

describe('HttpTransport', () => {
    test('should pass method, params, body, timeout and auth to axios', async () => {
        const { transport, requests } = createFakeServer(() => ({ status: 200, data: { ok: true } }));

        const response = await transport.request('PUT', `${BASE}/mydb/doc1`, {
            params: { rev: '1-abc' },
            data: { _id: 'doc1' },
            timeout: 1500,
            auth: { username: 'admin', password: 'test-secret' },
        });

        expect(response.status).toBe(200);
        expect(response.data).toEqual({ ok: true });
        expect(requests).toHaveLength(1);
        expect(requests[0]).toMatchObject({
            method: 'PUT',
            url: `${BASE}/mydb/doc1`,
            params: { rev: '1-abc' },
            data: '{"_id":"doc1"}',
            timeout: 1500,
            auth: { username: 'admin', password: 'test-secret' },
        });
        expect(requests[0]?.headers['user-agent']).toBe('test-agent');
    });

    test('should resolve error statuses instead of throwing', async () => {
        const { transport } = createFakeServer(() => ({ status: 500, data: 'boom' }));
        const response = await transport.request('GET', `${BASE}/mydb`);
        expect(response.status).toBe(500);
    });

    test('should keep cookies the server sets and send them back', async () => {
        const { transport, requests } = createFakeServer((request) =>
            request.url.endsWith('/_session')
                ? { status: 200, data: { ok: true }, headers: { 'set-cookie': ['AuthSession=abc123; Path=/'] } }
                : { status: 200, data: {} }
        );

        await transport.request('POST', `${BASE}/_session`);
        await transport.request('GET', `${BASE}/mydb`);

        expect(transport.cookies.keys()).toEqual(['AuthSession']);
        expect(requests[0]?.headers['cookie']).toBeUndefined();
        expect(requests[1]?.headers['cookie']).toBe('AuthSession=abc123');
    });

    test('should not overwrite a Cookie header given by the caller', async () => {
        const { transport, requests } = createFakeServer(() => ({ status: 200 }));
        transport.cookies.setFromHeaders(['AuthSession=abc123'], BASE);

        await transport.request('GET', `${BASE}/mydb`, { headers: { cookie: 'manual=1' } });
        expect(requests[0]?.headers['cookie']).toBe('manual=1');
    });

    test('should propagate network errors unchanged', async () => {
        const failure = new Error('connect ECONNREFUSED');
        const { transport } = createFakeServer(() => {
            throw failure;
        });

        expect(await rejectionOf(transport.request('GET', `${BASE}/mydb`))).toBe(failure);
    });
});
