import 'dotenv/config';
import PublishServer from './server.js';

const server = new PublishServer();
server.start();
