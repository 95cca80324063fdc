import 'dotenv/config';
import { createLogger, errorMessage } from '@care-companion/shared';
import { createPipeline, loadConfig } from '@care-companion/assistant';
import { buildChatApp } from './app';

const log = createLogger('chat-service');

/**
 * Start server
 */
const start = async () => {
    const config = loadConfig();
    if (!config.retrieval.baseUrl) {
        log.warn('RETRIEVAL_BASE_URL is not set, answers will carry no reference material');
    }
    const pipeline = createPipeline(config);
    const app = buildChatApp({ generator: pipeline.generator, memory: pipeline.memory });

    await app.listen({ port: config.server.chatPort, host: '0.0.0.0' });
    console.log(`\n🩺 Chat service running on http://localhost:${config.server.chatPort}`);
};

start().catch((err) => {
    log.error({ err: errorMessage(err) }, 'Chat service failed to start');
    process.exit(1);
});
