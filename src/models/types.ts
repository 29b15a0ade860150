/**
 * Core domain types for the cart service
 */

export const CART_STATUSES = ['ACTIVE', 'ABANDONED', 'COMPLETED'] as const;

export type CartStatus = (typeof CART_STATUSES)[number];

export interface CartItem {
  articleId: number;
  articleName: string;
  quantity: number;
  price: number;
  subtotal: number;
}

export interface Cart {
  id: number | null;
  userId: string;
  sessionId: string;
  items: CartItem[];
  total: number;
  status: CartStatus;
  lastActivity: Date;
  createdAt: Date;
  version: number;
}

export interface AddItemInput {
  articleId: number;
  articleName: string;
  quantity: number;
  price: number;
}

/**
 * Limits and clock the aggregate checks every mutation against
 */
export interface CartRules {
  now: Date;
  ttlMs: number;
  maxItems: number;
  maxQuantity: number;
}

export interface SessionInfo {
  expiresAt: Date;
  approachingExpiry: boolean;
  stale: boolean;
}

export interface CartResponse {
  cart: Cart;
  session: SessionInfo;
}

export interface CartStatistics {
  active: number;
  abandoned: number;
  completed: number;
  recentActive: number;
}

export interface SweepResult {
  scanned: number;
  abandoned: number;
  skipped: number;
  failed: number;
  durationMs: number;
}

export interface CartUser {
  userId: string;
  role: string;
}
