import express, { Express, Response } from 'express';
import cors from 'cors';
import { InvalidArgumentError, NotFoundError } from './errors';
import { IndexWriter } from './catalog/indexWriter';
import { RecommendationEngine } from './recommendations/recommendationEngine';
import { CustomerFeatureExtractor } from './segments/customerFeatures';
import { runSegmentation } from './segments/segmentJob';
import { SegmentationEngine } from './segments/segmentationEngine';
import { RecordStore } from './store/recordStore';
import {
  parseCustomerUpdate,
  parseInteraction,
  parseK,
  parseProduct,
  parsePurchase,
  parseTopN,
} from './validation';

export interface AppDeps {
  store: RecordStore;
  indexWriter: IndexWriter;
  recommender: RecommendationEngine;
  extractor: CustomerFeatureExtractor;
  segmentation: SegmentationEngine;
  defaultTopN: number;
  segmentCount: number;
}

function sendError(res: Response, tag: string, error: unknown) {
  if (error instanceof NotFoundError) {
    return res.status(404).json({ error: error.message });
  }
  if (error instanceof InvalidArgumentError) {
    return res.status(400).json({ error: error.message });
  }
  console.error(`[${tag}] error:`, error);
  return res.status(500).json({ error: 'Internal server error' });
}

export function createApp(deps: AppDeps): Express {
  const { store, indexWriter, recommender, extractor, segmentation } = deps;
  const { index } = indexWriter;
  const app: Express = express();

  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', indexedProducts: index.size });
  });

  /**
   * POST /api/products
   * Adds or edits a product and refreshes its vector.
   */
  app.post('/api/products', async (req, res) => {
    try {
      const product = parseProduct(req.body);
      await store.addProduct(product);
      await indexWriter.upsert(product);
      return res.status(201).json(product);
    } catch (error) {
      return sendError(res, 'products', error);
    }
  });

  app.get('/api/products/:productId', async (req, res) => {
    try {
      const product = await store.getProduct(req.params.productId);
      if (!product) {
        throw new NotFoundError(`Product ${req.params.productId} not found`);
      }
      return res.json(product);
    } catch (error) {
      return sendError(res, 'products', error);
    }
  });

  app.get('/api/products/:productId/similar', async (req, res) => {
    try {
      const { productId } = req.params;
      const topN = parseTopN(req.query.topN, deps.defaultTopN);
      const similar = index.nearestNeighbors(productId, topN);
      return res.json({ productId, similar });
    } catch (error) {
      return sendError(res, 'products/similar', error);
    }
  });

  app.post('/api/index/rebuild', async (_req, res) => {
    try {
      const indexed = await indexWriter.rebuild();
      return res.json({ indexed });
    } catch (error) {
      return sendError(res, 'index/rebuild', error);
    }
  });

  /**
   * PUT /api/customers/:customerId
   * Creates or updates a customer profile.
   */
  app.put('/api/customers/:customerId', async (req, res) => {
    try {
      const updates = parseCustomerUpdate(req.body);
      const profile = await store.upsertCustomer(req.params.customerId, updates);
      return res.json(profile);
    } catch (error) {
      return sendError(res, 'customers', error);
    }
  });

  app.get('/api/customers/:customerId', async (req, res) => {
    try {
      const profile = await store.getCustomer(req.params.customerId);
      if (!profile) {
        throw new NotFoundError(`Customer ${req.params.customerId} not found`);
      }
      return res.json(profile);
    } catch (error) {
      return sendError(res, 'customers', error);
    }
  });

  app.get('/api/customers/:customerId/features', async (req, res) => {
    try {
      const feature = await extractor.extract(req.params.customerId);
      return res.json(feature);
    } catch (error) {
      return sendError(res, 'customers/features', error);
    }
  });

  app.post('/api/customers/:customerId/interactions', async (req, res) => {
    try {
      const interaction = parseInteraction(req.params.customerId, req.body);
      if (!(await store.getProduct(interaction.productId))) {
        throw new NotFoundError(`Product ${interaction.productId} not found`);
      }
      await store.recordInteraction(interaction);
      return res.status(201).json(interaction);
    } catch (error) {
      return sendError(res, 'customers/interactions', error);
    }
  });

  app.post('/api/customers/:customerId/purchases', async (req, res) => {
    try {
      const purchase = parsePurchase(req.params.customerId, req.body);
      if (!(await store.getProduct(purchase.productId))) {
        throw new NotFoundError(`Product ${purchase.productId} not found`);
      }
      await store.recordPurchase(purchase);
      return res.status(201).json(purchase);
    } catch (error) {
      return sendError(res, 'customers/purchases', error);
    }
  });

  /**
   * GET /api/recommendations/:customerId?topN=
   * Runs the recommendation waterfall for one customer.
   */
  app.get('/api/recommendations/:customerId', async (req, res) => {
    const startTime = Date.now();
    try {
      const topN = parseTopN(req.query.topN, deps.defaultTopN);
      const result = await recommender.recommend(req.params.customerId, topN);
      console.log('[recommend] Served in', Date.now() - startTime, 'ms', {
        customerId: result.customerId,
        strategy: result.strategy,
        count: result.productIds.length,
      });
      return res.json(result);
    } catch (error) {
      return sendError(res, 'recommend', error);
    }
  });

  app.post('/api/segments/run', async (req, res) => {
    try {
      const k = parseK(req.body, deps.segmentCount);
      const summary = await runSegmentation({ store, extractor, engine: segmentation }, k);
      return res.json(summary);
    } catch (error) {
      return sendError(res, 'segments', error);
    }
  });

  return app;
}
