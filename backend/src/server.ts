import { WebSocketServer, WebSocket } from 'ws';
import { CONFIG } from './config';
import { Database, createVaultPool } from './database';
import { createApp } from './app';
import { Orchestrator } from './origami/orchestrator';

async function main() {
    const vault = new Database(createVaultPool(CONFIG.DATABASE_URL));
    await vault.open();

    const orchestrator = new Orchestrator();
    const app = createApp({ orchestrator, vault });

    // --- Server Start ---

    const server = app.listen(CONFIG.PORT, () => {
        console.log(`Origami design service running on http://localhost:${CONFIG.PORT}`);
    });

    // --- WebSocket ---

    const wss = new WebSocketServer({ server });

    wss.on('connection', (ws) => {
        console.log('Client connected');
        ws.send(JSON.stringify({ type: 'log', data: 'Connected to Origami Design Stream' }));
    });

    // Broadcast helper
    function broadcast(type: string, data: unknown) {
        const payload = JSON.stringify({ type, data });
        wss.clients.forEach(client => {
            if (client.readyState === WebSocket.OPEN) {
                client.send(payload);
            }
        });
    }

    // Hook into Orchestrator events
    orchestrator.on('log', (msg) => broadcast('log', msg));
    orchestrator.on('status', (msg) => broadcast('status', msg));
    orchestrator.on('warning', (warning) => broadcast('warning', warning));
    orchestrator.on('design_complete', (result) => broadcast('design_complete', result));
    orchestrator.on('design_failed', (failure) => broadcast('design_failed', failure));

    const shutdown = () => {
        wss.close();
        server.close(() => {
            vault.close().then(() => process.exit(0), (err) => {
                console.error('Could not close design vault', err);
                process.exit(1);
            });
        });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err) => {
    console.error('Failed to start origami design service', err);
    process.exit(1);
});
