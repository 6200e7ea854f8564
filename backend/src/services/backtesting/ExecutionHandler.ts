import { FillEvent, OrderEvent, CommissionModel } from './types';
import { createFillEvent } from './events';
import { logger } from '../../utils/logger';

/**
 * Converts an order into a fill given a reference price.
 * Returns null when the order is refused.
 */
export interface ExecutionPolicy {
  execute(order: OrderEvent, referencePrice: number): FillEvent | null;
}

export const DEFAULT_COMMISSION_MODEL: CommissionModel = {
  per_share: 0.005,
  pct: 0,
  minimum: 1.0
};

export interface SimpleExecutionOptions extends Partial<CommissionModel> {
  handlerId?: string;
  description?: string;
}

// Fills MARKET orders immediately at the reference price, no slippage
export class SimpleExecutionHandler implements ExecutionPolicy {
  readonly handlerId: string;
  readonly description: string;
  private commissionModel: CommissionModel;

  constructor(options: SimpleExecutionOptions = {}) {
    this.handlerId = options.handlerId ?? 'SimpleExec';
    this.description = options.description ?? 'Simple fill-at-market execution with commission';
    this.commissionModel = {
      per_share: options.per_share ?? DEFAULT_COMMISSION_MODEL.per_share,
      pct: options.pct ?? DEFAULT_COMMISSION_MODEL.pct,
      minimum: options.minimum ?? DEFAULT_COMMISSION_MODEL.minimum
    };
  }

  calculateCommission(quantity: number, price: number): number {
    if (quantity <= 0) return 0;

    const { per_share, pct, minimum } = this.commissionModel;
    const commission = per_share * quantity + pct * quantity * price;
    return Math.max(commission, minimum);
  }

  execute(order: OrderEvent, referencePrice: number): FillEvent | null {
    if (order.order_type !== 'MARKET') {
      logger.warn(`${this.handlerId}: only MARKET orders are supported, ${order.order_type} order ${order.order_id} ignored`);
      return null;
    }
    if (!Number.isFinite(referencePrice) || referencePrice <= 0) {
      logger.warn(`${this.handlerId}: invalid reference price ${referencePrice} for ${order.symbol}, order ${order.order_id} ignored`);
      return null;
    }
    if (!Number.isFinite(order.quantity) || order.quantity <= 0) {
      logger.warn(`${this.handlerId}: order quantity must be positive, order ${order.order_id} ignored`);
      return null;
    }

    return createFillEvent({
      timestamp: order.timestamp,
      symbol: order.symbol,
      direction: order.direction,
      quantity: order.quantity,
      fill_price: referencePrice,
      commission: this.calculateCommission(order.quantity, referencePrice),
      order_id: order.order_id
    });
  }
}
