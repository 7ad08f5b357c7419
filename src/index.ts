import { createApp } from './app';
import { getEngineConfig } from './config/engineConfig';
import { getFirestore } from './config/firestore';
import { RecommendationEngine } from './recommendation/recommendationEngine';
import { InMemoryKeyValueCache, KeyValueCache } from './recommendation/targetCache';
import { FirestoreKeyValueCache } from './recommendation/firestoreTargetCache';

const config = getEngineConfig();

const cache: KeyValueCache =
  config.targetCacheBackend === 'firestore'
    ? new FirestoreKeyValueCache(getFirestore(), config.targetCacheCollection)
    : new InMemoryKeyValueCache();

const recommendations = new RecommendationEngine({
  cache,
  scalingPolicy: config.scalingPolicy,
  timeZone: config.timeZone,
  algorithmVersion: config.algorithmVersion,
});

const app = createApp({ config, recommendations });

app.listen(config.port, () => {
  console.log(`lifespan-impact-backend listening on :${config.port}`, {
    scalingPolicy: config.scalingPolicy,
    targetCache: config.targetCacheBackend,
  });
});
