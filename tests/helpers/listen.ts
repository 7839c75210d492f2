import type { Express } from 'express';
import type { Server } from 'http';

/**
 * Listen on an ephemeral port and return the server with its base URL.
 */
export async function listenOnFreePort(app: Express): Promise<{ server: Server; baseUrl: string }> {
    const server = await new Promise<Server>(resolve => {
        const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('expected a TCP address');
    }
    return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

export function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
    });
}
