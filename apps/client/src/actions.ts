import { createSilentLogger, type Logger } from "@evcs/observability";

import type { Bill, ChargingApi, OrderDetail } from "./api/client";
import type { ApiResult } from "./api/errors";
import type { SessionStore } from "./stores/sessionStore";

export type ActionOutcome<T = undefined> = { ok: true; message: string; data: T } | { ok: false; message: string };

export type RoleLabel = "USER" | "ADMIN" | "无";

export type SessionStatus = {
  authenticated: boolean;
  roleLabel: RoleLabel;
  stateLabel: "已登陆" | "未登陆";
};

export const MESSAGES = {
  adminRejected: "请使用用户账号",
  loggedIn: "登陆成功",
  registered: "注册成功",
  loggedOut: "成功注销",
  queried: "查询成功",
  submitted: "请求提交成功",
  edited: "修改充电请求成功",
  ended: "已结束请求"
} as const;

export const BILL_COLUMNS = [
  "bill_id",
  "create_time",
  "pile_id",
  "charged_amount",
  "charged_time",
  "begin_time",
  "end_time",
  "charging_cost",
  "service_cost",
  "total_cost"
] as const;

// Key spellings are the server's, including "chargedAamount".
export const ORDER_DETAIL_COLUMNS = [
  "car_id",
  "data",
  "Bill_id",
  "chargedPileNum",
  "chargedAamount",
  "chargedDuration",
  "StartTime",
  "EndTime",
  "ChargeFee",
  "ServiceFee",
  "subtotalFee"
] as const;

function cellText(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

export function toRows(records: ReadonlyArray<Record<string, unknown>>, columns: readonly string[]): string[][] {
  return records.map((record) => columns.map((column) => cellText(record[column])));
}

function settle<T>(result: ApiResult<T>, message: string): ActionOutcome<T> {
  if (!result.success) return { ok: false, message: result.error.message };
  return { ok: true, message, data: result.data };
}

/**
 * Handlers behind the client's buttons. Each one returns the text a toast should show;
 * none of them throws.
 */
export function createActions(deps: { api: ChargingApi; session: SessionStore; logger?: Logger }) {
  const { api, session } = deps;
  const logger = deps.logger ?? createSilentLogger();

  return {
    async login(username: string, password: string): Promise<ActionOutcome<{ roleLabel: RoleLabel }>> {
      const result = await api.login(username, password);
      if (!result.success) return { ok: false, message: result.error.message };

      // This client serves users only; admins have their own console.
      if (result.data.isAdmin) {
        logger.info({ username }, "admin login rejected");
        return { ok: false, message: MESSAGES.adminRejected };
      }

      session.setSession(result.data.token, false);
      logger.info({ username }, "logged in");
      return { ok: true, message: MESSAGES.loggedIn, data: { roleLabel: "USER" } };
    },

    async register(username: string, password: string): Promise<ActionOutcome<void>> {
      return settle(await api.register(username, password), MESSAGES.registered);
    },

    logout(): ActionOutcome {
      session.clearSession();
      logger.info("logged out");
      return { ok: true, message: MESSAGES.loggedOut, data: undefined };
    },

    sessionStatus(): SessionStatus {
      if (!session.isAuthenticated()) {
        return { authenticated: false, roleLabel: "无", stateLabel: "未登陆" };
      }
      return { authenticated: true, roleLabel: session.isAdmin() ? "ADMIN" : "USER", stateLabel: "已登陆" };
    },

    async submitRequest(modeLabel: string, amount: string, batterySize: string): Promise<ActionOutcome<void>> {
      return settle(await api.submitChargingRequest(modeLabel, amount, batterySize), MESSAGES.submitted);
    },

    async editRequest(modeLabel: string, amount: string): Promise<ActionOutcome<void>> {
      return settle(await api.editChargingRequest(modeLabel, amount), MESSAGES.edited);
    },

    async endRequest(): Promise<ActionOutcome<void>> {
      return settle(await api.endChargingRequest(), MESSAGES.ended);
    },

    async queryBills(): Promise<ActionOutcome<{ bills: Bill[]; rows: string[][] }>> {
      const result = await api.queryTodayBills();
      if (!result.success) return { ok: false, message: result.error.message };
      return {
        ok: true,
        message: MESSAGES.queried,
        data: { bills: result.data, rows: toRows(result.data, BILL_COLUMNS) }
      };
    },

    async queryOrderDetail(billId: string): Promise<ActionOutcome<{ details: OrderDetail[]; rows: string[][] }>> {
      const result = await api.queryOrderDetail(billId);
      if (!result.success) return { ok: false, message: result.error.message };
      return {
        ok: true,
        message: MESSAGES.queried,
        data: { details: result.data, rows: toRows(result.data, ORDER_DETAIL_COLUMNS) }
      };
    }
  };
}

export type ClientActions = ReturnType<typeof createActions>;
