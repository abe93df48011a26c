// src/cli/initIndex.ts
import 'dotenv/config';
import { loadConfig } from '../config';
import { createContainer } from '../container';
import { initializeIndex, processFables, readCorpus } from '../corpus/loader';
import { createLogger } from '../logger';

const SMOKE_QUERY = 'a story about honesty and lying';

/** Rebuilds the fable collection from DATA_PATH, then runs one sample search. */
async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const container = createContainer(config, logger);

  try {
    const fables = processFables(await readCorpus(config.dataPath));
    logger.info({ path: config.dataPath, fables: fables.length }, 'Loaded corpus');

    const stats = await initializeIndex(fables, {
      encoder: container.encoder,
      index: container.index,
      metric: config.index.distance,
      logger,
    });
    logger.info(stats, 'Statistics');

    if (fables.length > 0) {
      const hits = await container.pipeline.search(SMOKE_QUERY, 3);
      for (const [rank, hit] of hits.entries()) {
        logger.info({ rank: rank + 1, id: hit.fable.id, title: hit.fable.title, score: Number(hit.score.toFixed(4)) }, `Sample search: ${SMOKE_QUERY}`);
      }
    }
  } finally {
    await container.close();
  }
}

main().catch((err) => {
  createLogger().fatal({ err }, 'Index initialization failed');
  process.exit(1);
});
