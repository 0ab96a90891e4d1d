import { RecordStore } from '../store/recordStore';
import { Product } from '../types';
import { productText } from './featureVectorizer';
import { SimilarityIndex } from './similarityIndex';

/**
 * Single writer for a SimilarityIndex.
 *
 * Rebuilds and upserts run one at a time in call order, so an upsert issued while a
 * rebuild is reading the store lands after that rebuild's snapshot is published.
 */
export class IndexWriter {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: RecordStore,
    readonly index: SimilarityIndex
  ) {}

  /**
   * Replaces the index with every product in the store. Resolves to the indexed count.
   */
  rebuild(): Promise<number> {
    return this.enqueue(async () => {
      const startTime = Date.now();
      const products = await this.store.getProductTexts();
      this.index.rebuild(products);
      console.log('[index] Rebuilt in', Date.now() - startTime, 'ms', { products: this.index.size });
      return this.index.size;
    });
  }

  upsert(product: Product): Promise<void> {
    return this.enqueue(async () => {
      this.index.upsert({ productId: product.productId, text: productText(product) });
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // The caller gets the failure through `run`; later writes still proceed
    this.queue = run.catch(() => undefined);
    return run;
  }
}
