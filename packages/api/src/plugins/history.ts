import fp from 'fastify-plugin';
import { ReadingHistory } from '../services/reading-history.js';

export interface HistoryPluginOptions {
  dbPath: string;
}

export default fp<HistoryPluginOptions>(async (fastify, opts) => {
  fastify.log.info({ dbPath: opts.dbPath }, 'Opening reading history');
  const history = new ReadingHistory(opts.dbPath);

  fastify.decorate('history', history);

  fastify.addHook('onClose', async () => {
    history.close();
  });
}, { name: 'history' });
