#!/usr/bin/env node
import { RegencyKernel } from '../kernel-core/Kernel.js';
import { Logger } from '../kernel-core/L0/Logger.js';
import type { WorldDefinition } from '../kernel-core/L0/Ontology.js';
import { periodicDelta } from '../kernel-core/L3/DayRules.js';
import type { DayRule } from '../kernel-core/L3/DayRules.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { SQLiteSnapshotStore } from '../infrastructure/persistence/SQLiteSnapshotStore.js';
import { OpenRouterGenerationService } from '../infrastructure/generation/OpenRouterGenerationService.js';
import { loadConfig } from '../config.js';
import { RegencyServer } from './Server.js';

/** Starting realm for a new session. */
export const DEFAULT_REALM: WorldDefinition = {
    'resources.treasury': { value: 500, bounds: { min: 0 } },
    'resources.grain': { value: 1200, bounds: { min: 0 } },
    'population.capital.count': { value: 8000, bounds: { min: 0 } },
    'population.capital.morale': { value: 60, bounds: { min: 0, max: 100 } },
    'factions.nobles.disposition': { value: 10, bounds: { min: -100, max: 100 } },
    'factions.clergy.disposition': { value: 25, bounds: { min: -100, max: 100 } },
    'military.levies': { value: 300, bounds: { min: 0 } },
    'realm.name': 'Aldmere',
    'realm.atWar': false
};

/** Upkeep that runs every day of a new session. */
export const DEFAULT_DAY_RULES: DayRule[] = [
    {
        id: 'capital-rations',
        description: 'The capital eats one measure of grain per thousand souls',
        effects: ({ read }) => {
            const count = read('population.capital.count');
            return typeof count === 'number' && count > 0
                ? [{ path: 'resources.grain', delta: -Math.ceil(count / 1000) }]
                : [];
        }
    },
    periodicDelta({ id: 'weekly-levy-pay', path: 'resources.treasury', delta: -15, everyDays: 7, description: 'Levies are paid each week' })
];

async function main() {
    const config = loadConfig();
    const logger = new Logger(config.logLevel);
    const log = logger.scope('Main');

    const eventStore = new SQLiteEventStore(config.databasePath);
    const saves = new SQLiteSnapshotStore(config.databasePath);
    const generation = config.openRouter ? new OpenRouterGenerationService(config.openRouter) : undefined;
    if (!generation) log.warn('OPENROUTER_API_KEY not set: arbitration and advisors are unavailable');

    const kernel = new RegencyKernel(DEFAULT_REALM, {
        thresholds: config.thresholds,
        generation,
        eventStore,
        logger,
        dayRules: DEFAULT_DAY_RULES
    });
    if (!kernel.verifyChronicle()) {
        log.warn('Stored chronicle fails verification');
    }

    const server = new RegencyServer(kernel, saves, logger);
    await server.listen(config.port);

    const shutdown = () => {
        server.close()
            .then(() => {
                eventStore.close();
                saves.close();
                process.exit(0);
            })
            .catch((e: unknown) => {
                log.error('Shutdown failed', e);
                process.exit(1);
            });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch((e: unknown) => {
    console.error('[Main] Failed to start', e);
    process.exit(1);
});
