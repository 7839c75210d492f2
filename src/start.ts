import 'dotenv/config';

import * as fs from 'fs';
import * as path from 'path';
import type { Server } from 'http';
import { bootstrap, EngineComponents } from './bootstrap';
import { getStatusPort } from './config/constants';
import { createStatusServer, startStatusServer } from './dashboard/server';
import { isSupabaseAvailable } from './integrations/supabaseClient';
import { errorMessage } from './utils/errors';
import logger from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// LOCKFILE PATH (one engine process per working directory)
// ═══════════════════════════════════════════════════════════════════════════════
const LOCKFILE_PATH = path.join(process.cwd(), '.position-engine.lock');

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════════

let components: EngineComponents | null = null;
let statusServer: Server | null = null;
let isShuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// LOCKFILE MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

function isProcessRunning(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch {
        return false;
    }
}

function acquireProcessLock(): boolean {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const existingPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);
            if (!isNaN(existingPid) && isProcessRunning(existingPid)) {
                return false;
            }
            logger.warn(`[STARTUP] Removing stale lockfile (PID ${existingPid} not running)`);
            fs.unlinkSync(LOCKFILE_PATH);
        }

        fs.writeFileSync(LOCKFILE_PATH, process.pid.toString(), 'utf8');
        return true;
    } catch (err: unknown) {
        logger.error(`[STARTUP] Failed to acquire process lock: ${errorMessage(err)}`);
        return false;
    }
}

function releaseProcessLock(): void {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const storedPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);
            if (storedPid === process.pid) {
                fs.unlinkSync(LOCKFILE_PATH);
            }
        }
    } catch (err: unknown) {
        process.stderr.write(`[SHUTDOWN] lockfile release failed: ${errorMessage(err)}\n`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * 1. Stop loops (each waits for its running cycle)
 * 2. Flush pending audit writes
 * 3. Close the status server
 * 4. Release process lock
 */
async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        return;
    }
    isShuttingDown = true;
    logger.info(`[SHUTDOWN] Received ${signal}, shutting down`);

    try {
        if (components) {
            await Promise.all(components.loops.map(loop => loop.stop()));
            await components.audit.flush();
        }

        const server = statusServer;
        if (server) {
            await new Promise<void>(resolve => server.close(() => resolve()));
        }

        // give file transports time to write
        await new Promise(resolve => setTimeout(resolve, 500));

        releaseProcessLock();
        logger.info('[SHUTDOWN] complete');
        process.exit(0);
    } catch (err: unknown) {
        logger.error(`[SHUTDOWN] Error during shutdown: ${errorMessage(err)}`);
        releaseProcessLock();
        process.exit(1);
    }
}

function attachProcessHandlers(): void {
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
        logger.error(`[FATAL] Uncaught Exception: ${error.message}`, { stack: error.stack });
        void gracefulShutdown('uncaughtException');
    });

    // Logged, not fatal
    process.on('unhandledRejection', (reason) => {
        logger.error(`[FATAL] Unhandled Rejection: ${errorMessage(reason)}`);
    });

    process.on('exit', () => {
        releaseProcessLock();
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRYPOINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
    logger.info(`[STARTUP] position engine starting pid=${process.pid}`);

    if (!acquireProcessLock()) {
        logger.error(`[STARTUP] Another instance is running. Remove ${LOCKFILE_PATH} if that is wrong.`);
        process.exit(0);
    }

    attachProcessHandlers();

    if (!isSupabaseAvailable()) {
        logger.error('[STARTUP] SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required');
        releaseProcessLock();
        process.exit(1);
    }

    components = bootstrap();

    statusServer = await startStatusServer(
        createStatusServer({ repository: components.repository, loops: components.loops }),
        getStatusPort()
    );

    for (const loop of components.loops) {
        loop.start();
    }

    logger.info('[STARTUP] runtime active');
}

main().catch((err: unknown) => {
    logger.error(`[STARTUP] fatal: ${errorMessage(err)}`);
    releaseProcessLock();
    process.exit(1);
});
