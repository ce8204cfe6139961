import { threadId } from 'node:worker_threads';
import { runInWorker } from '../../src/bridge';
import { defineService } from '../../src/service';

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

void runInWorker(
  defineService({
    actions: {
      ping: async () => ({ pong: true, threadId }),
      settings: async (_payload, _request, context) => ({ heartbeatIntervalMs: context.heartbeatIntervalMs }),
      work: async (payload) => {
        await sleep(Number(payload.delayMs));
        return { n: payload.n };
      },
      escape: async () => {
        setImmediate(() => {
          throw new Error('escaped from handler');
        });
        return { scheduled: true };
      },
      exit: async (payload) => process.exit(Number(payload.code)),
    },
  }),
);
