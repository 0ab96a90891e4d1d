import { createApp } from './app';
import { loadSettings, Settings } from './config/settings';
import { FeatureVectorizer } from './catalog/featureVectorizer';
import { IndexWriter } from './catalog/indexWriter';
import { SimilarityIndex } from './catalog/similarityIndex';
import { RecommendationEngine } from './recommendations/recommendationEngine';
import { CustomerFeatureExtractor } from './segments/customerFeatures';
import { SegmentationEngine } from './segments/segmentationEngine';
import { MemoryRecordStore } from './store/memoryRecordStore';
import { RecordStore } from './store/recordStore';
import { loadSampleData } from './store/sampleData';

async function createStore(settings: Settings): Promise<RecordStore> {
  if (settings.recordStore === 'memory') {
    const store = new MemoryRecordStore();
    if (settings.seedSampleData) {
      await loadSampleData(store);
    }
    return store;
  }

  const { connectFirestore } = await import('./config/firestore');
  const { FirestoreRecordStore } = await import('./store/firestoreRecordStore');
  return new FirestoreRecordStore(connectFirestore(settings.firestore));
}

async function main(): Promise<void> {
  const settings = loadSettings();
  const store = await createStore(settings);

  const index = new SimilarityIndex(
    new FeatureVectorizer({ dimensions: settings.vectorDimensions, salt: settings.vectorSalt })
  );
  const indexWriter = new IndexWriter(store, index);
  await indexWriter.rebuild();

  const app = createApp({
    store,
    indexWriter,
    recommender: new RecommendationEngine(store, index, {
      recentInteractionLimit: settings.recentInteractionLimit,
    }),
    extractor: new CustomerFeatureExtractor(store),
    segmentation: new SegmentationEngine({
      seed: settings.segmentSeed,
      maxIterations: settings.segmentMaxIterations,
    }),
    defaultTopN: settings.defaultTopN,
    segmentCount: settings.segmentCount,
  });

  app.listen(settings.port, () => {
    console.log(`catalog-recommender listening on :${settings.port}`, {
      recordStore: settings.recordStore,
      indexedProducts: index.size,
    });
  });
}

main().catch((error) => {
  console.error('Error starting server:', error);
  process.exit(1);
});
