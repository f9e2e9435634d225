// src/index.ts

import { AlertNotifier } from './alert/AlertNotifier.ts';
import { loadConfig } from './config/Config.ts';
import { WarehouseClient } from './db/WarehouseClient.ts';
import { describeError } from './errors/PipelineErrors.ts';
import { WeatherPipeline, formatRunAlert } from './pipeline/WeatherPipeline.ts';
import { createLogger } from './utils/Logger.ts';

//central logger init
const logger = createLogger('app');
logger.info('Application starting...');

async function main(): Promise<number> {
    const config = await loadConfig();
    const alerts = new AlertNotifier(config.alerts.webhookUrl);
    let warehouse: WarehouseClient | undefined;

    // SIGINT/SIGTERM stop the run only while it has not started writing
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    process.once('SIGINT', abort);
    process.once('SIGTERM', abort);

    try {
        warehouse = new WarehouseClient(config.warehouse.table, config.warehouse.databaseUrl);
        const pipeline = WeatherPipeline.fromConfig(config, warehouse);
        const summary = await pipeline.run(controller.signal);

        if (summary.status === 'failed' || summary.status === 'aborted') {
            await alerts.notify(formatRunAlert(summary));
            return 1;
        }
        return 0;
    } catch (err) {
        logger.error({ err }, 'Pipeline run crashed');
        await alerts.notify(`weather-facts-etl failed: ${describeError(err)}`);
        return 1;
    } finally {
        process.off('SIGINT', abort);
        process.off('SIGTERM', abort);
        await warehouse?.close();
    }
}

try {
    process.exitCode = await main();
} catch (err) {
    // configuration problems land here, before alerts are available
    logger.error({ err }, `Startup failed: ${describeError(err)}`);
    process.exitCode = 1;
}
