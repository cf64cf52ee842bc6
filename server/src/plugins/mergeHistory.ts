import fp from 'fastify-plugin';
import { MergeHistory } from '../services/mergeService.js';

declare module 'fastify' {
  interface FastifyInstance {
    mergeHistory: MergeHistory;
  }
}

export default fp(
  async function mergeHistoryPlugin(fastify) {
    fastify.decorate('mergeHistory', new MergeHistory(fastify.config.mergeHistorySize));
  },
  {
    name: 'merge-history',
    dependencies: ['config'],
  },
);
