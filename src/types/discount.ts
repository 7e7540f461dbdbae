// src/types/discount.ts

/**
 * Promotional code
 *
 * Valid iff active, uses remaining and not expired.
 */
export interface DiscountCode {
  code: string;
  discountPercentage: number; // fraction, 0 < p <= 1
  maxUses: number;
  currentUses: number;
  expiresAt: Date | null;
  isActive: boolean;
  createdAt: Date;
}

export interface NewDiscountCode {
  code: string;
  discountPercentage: number;
  maxUses: number;
  expiresAt?: Date | null;
}
