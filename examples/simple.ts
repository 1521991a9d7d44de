import { pingServer, PingError } from '../src/index.js';

// Simple Ping Example
// Prints what a server shows in the multiplayer list.

async function main() {
    // Configuration
    const TARGET_HOST = 'localhost';  // Minecraft server to ping
    const TARGET_PORT = 25565;        // Its port

    console.log(`Pinging ${TARGET_HOST}:${TARGET_PORT}...`);

    try {
        const status = await pingServer(TARGET_HOST, TARGET_PORT, { timeout: 3000 });

        console.log(`Version: ${status.version} (protocol ${status.protocol})`);
        console.log(`Players: ${status.onlinePlayers}/${status.maxPlayers}`);
        for (const player of status.sample) {
            console.log(`  - ${player.name}`);
        }
        console.log(`MOTD:    ${status.description}`);
        console.log(`Latency: ${status.latency}ms`);
        if (status.favicon) {
            console.log(`Favicon: ${status.favicon.length} bytes`);
        }
    } catch (error) {
        if (error instanceof PingError) {
            console.error(`Ping failed (${error.code}): ${error.message}`);
        } else {
            console.error('Ping failed:', error);
        }
    }
}

main();
