import { getPlayerCount, isOnline } from '../src/index.js';

// Example: Checking several servers of a network at once

const servers = [
    { name: 'Survival', host: 'localhost', port: 25575 },
    { name: 'Creative', host: 'localhost', port: 25576 },
    { name: 'Minigames', host: 'localhost', port: 25577 },
];

async function main() {
    console.log('Checking network...');

    const results = await Promise.all(
        servers.map(async (server) => {
            if (!(await isOnline(server.host, server.port, 2000))) {
                return `${server.name}: offline`;
            }
            const players = await getPlayerCount(server.host, server.port, 2000);
            return `${server.name}: ${players.online}/${players.max} players`;
        })
    );

    for (const line of results) {
        console.log(line);
    }
}

main().catch(console.error);
