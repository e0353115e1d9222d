import { getConfig } from '../src/config.js';

try {
    const config = getConfig();
    console.log('Config OK:', JSON.stringify(config, null, 2));
} catch (error) {
    console.error('Config error:', error instanceof Error ? error.message : error);
    process.exit(1);
}
