import 'reflect-metadata';
import { createApp } from './app';
import { CONFIG } from './config';

const app = createApp();

app.listen(CONFIG.PORT, CONFIG.HOST, () => {
    console.log(`Vision Q&A server running on http://${CONFIG.HOST}:${CONFIG.PORT}`);
    console.log(`History file: ${CONFIG.HISTORY_FILE} (persist by default: ${CONFIG.PERSIST_HISTORY})`);
});
