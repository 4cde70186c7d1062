import type { z } from "zod";

import type { ApiResult } from "./errors";
import type {
  adminRecordSchema,
  billSchema,
  chargingStateSchema,
  orderDetailSchema,
  serverTimeSchema
} from "./schemas";

export type ApiMode = "mock" | "http";

export type ChargingState = z.infer<typeof chargingStateSchema>;

export type ChargingStatus = {
  state: ChargingState;
  /** Requests ahead of ours; `null` when the server reports -1 (not applicable). */
  queueLength: number | null;
  chargeRequestId: string | null;
};

export type ServerTime = z.infer<typeof serverTimeSchema>;

export type LoginResult = {
  token: string;
  isAdmin: boolean;
};

export type Bill = z.infer<typeof billSchema>;
export type OrderDetail = z.infer<typeof orderDetailSchema>;
export type AdminRecord = z.infer<typeof adminRecordSchema>;

export type ChargeModeCode = "F" | "T";

export const FAST_CHARGE_LABEL = "快充";
export const TRICKLE_CHARGE_LABEL = "慢充";

export function encodeChargeMode(label: string): ChargeModeCode {
  return label.trim() === FAST_CHARGE_LABEL ? "F" : "T";
}

export type ChargingApi = {
  login: (username: string, password: string) => Promise<ApiResult<LoginResult>>;
  register: (username: string, password: string) => Promise<ApiResult<void>>;
  serverTime: () => Promise<ApiResult<ServerTime>>;

  submitChargingRequest: (modeLabel: string, amount: string, batterySize: string) => Promise<ApiResult<void>>;
  editChargingRequest: (modeLabel: string, amount: string) => Promise<ApiResult<void>>;
  endChargingRequest: () => Promise<ApiResult<void>>;
  previewQueue: () => Promise<ApiResult<ChargingStatus>>;

  queryBill: (date: string) => Promise<ApiResult<Bill[]>>;
  queryOrderDetail: (billId: string) => Promise<ApiResult<OrderDetail[]>>;
  queryTodayBills: () => Promise<ApiResult<Bill[]>>;

  admin: {
    queryAllPilesStat: () => Promise<ApiResult<AdminRecord>>;
    queryReport: () => Promise<ApiResult<AdminRecord[]>>;
    queryQueue: () => Promise<ApiResult<AdminRecord[]>>;
    updatePile: (pileId: string, status: string) => Promise<ApiResult<void>>;
  };
};
