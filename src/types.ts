export type InteractionType = 'view' | 'cart_add' | 'wishlist' | 'purchase' | 'search';

export const INTERACTION_TYPES: readonly InteractionType[] = [
  'view',
  'cart_add',
  'wishlist',
  'purchase',
  'search',
];

export interface Product {
  productId: string;
  name: string;
  category: string;
  price: number;
  description: string;
  tags: string[];
  popularityScore: number;
}

/**
 * Concatenated name, description and tags of one product.
 */
export interface ProductText {
  productId: string;
  text: string;
}

export interface CustomerProfile {
  customerId: string;
  name: string;
  age: number | null;
  gender: string | null;
  location: string | null;
  segment: string | null;
  preferences: Record<string, string>;
  lastActivity: string;
  createdAt: string;
  updatedAt: string;
}

export type CustomerProfileUpdate = Partial<
  Pick<CustomerProfile, 'name' | 'age' | 'gender' | 'location' | 'preferences'>
>;

export interface Interaction {
  customerId: string;
  productId: string;
  type: InteractionType;
  timestamp: string;
  durationSeconds: number;
}

export interface Purchase {
  customerId: string;
  productId: string;
  quantity: number;
  amount: number;
  timestamp: string;
}

export interface PurchaseStats {
  purchaseCount: number;
  totalSpent: number;
  activeMonths: number;
}

export interface CustomerFeature extends PurchaseStats {
  customerId: string;
  interactionCount: number;
}

export type SegmentAssignment = ReadonlyMap<string, string>;

export type RecommendationStrategy = 'personalized' | 'segment' | 'popularity';

export interface RecommendationResult {
  customerId: string;
  strategy: RecommendationStrategy;
  productIds: string[];
}
