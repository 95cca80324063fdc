import 'dotenv/config';
import { createLogger, errorMessage } from '@care-companion/shared';
import { FileTestRunRepository, loadConfig } from '@care-companion/assistant';
import { buildReviewApp } from './app';

const log = createLogger('review-service');

/**
 * Start server
 */
const start = async () => {
    const config = loadConfig();
    const app = buildReviewApp({ runs: new FileTestRunRepository(config.resultsDir) });

    await app.listen({ port: config.server.reviewPort, host: '0.0.0.0' });
    console.log(`\n📝 Review service running on http://localhost:${config.server.reviewPort}`);
};

start().catch((err) => {
    log.error({ err: errorMessage(err) }, 'Review service failed to start');
    process.exit(1);
});
