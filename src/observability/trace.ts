import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  accountId?: string;
  shopName?: string;
}

export function createTraceContext(overrides?: Partial<TraceContext>): TraceContext {
  return {
    requestId: overrides?.requestId ?? uuidv4(),
    accountId: overrides?.accountId,
    shopName: overrides?.shopName,
  };
}
