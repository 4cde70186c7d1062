import type { Logger } from "@evcs/observability";

import { encodeChargeMode, type ChargingApi } from "./client";
import {
  adminRecordListSchema,
  adminRecordSchema,
  billListSchema,
  loginSchema,
  orderDetailListSchema,
  previewQueueSchema,
  serverTimeSchema,
  voidSchema
} from "./schemas";
import { createTransport, type FetchFn } from "./transport";

type HttpClientOptions = {
  baseUrl: string;
  getToken?: () => string | null;
  fetchFn?: FetchFn;
  requestTimeoutMs?: number;
  logger?: Logger;
};

export function createHttpClient(options: HttpClientOptions): ChargingApi {
  const transport = createTransport(options);
  const call = transport.call;

  const client: ChargingApi = {
    login(username, password) {
      return call("POST", "/login", { username, password }, loginSchema);
    },
    register(username, password) {
      return call("POST", "/user/register", { username, password, re_password: password }, voidSchema);
    },
    serverTime() {
      return call("GET", "/time", undefined, serverTimeSchema);
    },

    submitChargingRequest(modeLabel, amount, batterySize) {
      return call(
        "POST",
        "/user/submit_charging_request",
        { charge_mode: encodeChargeMode(modeLabel), require_amount: amount, battery_size: batterySize },
        voidSchema
      );
    },
    editChargingRequest(modeLabel, amount) {
      return call(
        "POST",
        "/user/edit_charging_request",
        { charge_mode: encodeChargeMode(modeLabel), require_amount: amount },
        voidSchema
      );
    },
    endChargingRequest() {
      return call("GET", "/user/end_charging_request", undefined, voidSchema);
    },
    previewQueue() {
      return call("GET", "/user/preview_queue", undefined, previewQueueSchema);
    },

    queryBill(date) {
      return call("POST", "/user/query_bill", { date }, billListSchema);
    },
    queryOrderDetail(billId) {
      return call("POST", "/user/query_order_detail", { bill_id: billId }, orderDetailListSchema);
    },
    // "Today" is the server's date, not the local clock's.
    async queryTodayBills() {
      const time = await client.serverTime();
      if (!time.success) return time;
      return client.queryBill(time.data.datetime);
    },

    admin: {
      queryAllPilesStat() {
        return call("GET", "/admin/query_all_piles_stat", undefined, adminRecordSchema);
      },
      queryReport() {
        return call("GET", "/admin/query_report", undefined, adminRecordListSchema);
      },
      queryQueue() {
        return call("GET", "/admin/query_queue", undefined, adminRecordListSchema);
      },
      updatePile(pileId, status) {
        return call("POST", "/admin/update_pile", { pile_id: pileId, status }, voidSchema);
      }
    }
  };

  return client;
}
