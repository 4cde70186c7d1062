import { describe, expect, it } from "vitest";

import { encodeChargeMode } from "../api/client";
import { createHttpClient } from "../api/httpClient";
import { createSessionStore } from "../stores/sessionStore";
import { appError, BASE_URL, envelope, fakeFetch, type Handler } from "./fakeFetch";

function setup(handler: Handler = () => envelope(null)) {
  const session = createSessionStore();
  const { fetchFn, calls } = fakeFetch(handler);
  const api = createHttpClient({ baseUrl: BASE_URL, getToken: () => session.currentToken() || null, fetchFn });
  return { api, session, calls, fetchFn };
}

describe("encodeChargeMode", () => {
  it("maps the fast label to F and everything else to T", () => {
    expect(encodeChargeMode("快充")).toBe("F");
    expect(encodeChargeMode("慢充")).toBe("T");
    expect(encodeChargeMode("")).toBe("T");
  });
});

describe("createHttpClient", () => {
  it("logs in and exposes the admin flag", async () => {
    const { api, calls } = setup(() => envelope({ token: "test-token", is_admin: false }));

    const result = await api.login("alice", "test-password");

    expect(result).toEqual({ success: true, data: { token: "test-token", isAdmin: false } });
    expect(calls[0]).toMatchObject({
      method: "POST",
      path: "/login",
      authorization: null,
      body: { username: "alice", password: "test-password" }
    });
  });

  it("attaches the session token to later calls once logged in", async () => {
    const { api, session, calls } = setup((req) =>
      req.path === "/login"
        ? envelope({ token: "test-token", is_admin: false })
        : envelope({ cur_state: "NOTCHARGING", queue_len: -1, charge_id: null })
    );

    const login = await api.login("alice", "test-password");
    if (!login.success) throw login.error;
    session.setSession(login.data.token, login.data.isAdmin);
    await api.previewQueue();

    expect(session.isAuthenticated()).toBe(true);
    expect(calls[1]).toMatchObject({ method: "GET", path: "/user/preview_queue", authorization: "Bearer test-token" });
  });

  it("sends the register confirmation password and surfaces a duplicate-name rejection verbatim", async () => {
    const { api, calls } = setup(() => appError("用户名已存在"));

    const result = await api.register("alice", "test-password");

    expect(calls[0]?.body).toEqual({ username: "alice", password: "test-password", re_password: "test-password" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("用户名已存在");
  });

  it("encodes the charge mode when submitting", async () => {
    const { api, calls } = setup();

    await api.submitChargingRequest("快充", "50", "60");
    await api.submitChargingRequest("慢充", "20", "60");

    expect(calls[0]).toMatchObject({
      method: "POST",
      path: "/user/submit_charging_request",
      body: { charge_mode: "F", require_amount: "50", battery_size: "60" }
    });
    expect(calls[1]?.body).toEqual({ charge_mode: "T", require_amount: "20", battery_size: "60" });
  });

  it("encodes the charge mode when editing and returns the server's rejection unchanged", async () => {
    const { api, calls } = setup(() => appError("正在充电 无法修改"));

    const result = await api.editChargingRequest("快充", "30");

    expect(calls[0]).toMatchObject({
      path: "/user/edit_charging_request",
      body: { charge_mode: "F", require_amount: "30" }
    });
    expect(result).toMatchObject({ success: false, error: { message: "正在充电 无法修改" } });
  });

  it("does not suppress an error from ending a request that does not exist", async () => {
    const { api, calls } = setup(() => appError("没有充电请求"));

    const result = await api.endChargingRequest();

    expect(calls[0]).toMatchObject({ method: "GET", path: "/user/end_charging_request" });
    expect(result).toMatchObject({ success: false, error: { kind: "ApplicationError", message: "没有充电请求" } });
  });

  it("decodes the queue preview, mapping -1 to no queue position", async () => {
    const { api } = setup(() => envelope({ cur_state: "WAITINGSTAGE1", queue_len: -1, charge_id: "F7" }));

    const result = await api.previewQueue();

    expect(result).toEqual({
      success: true,
      data: { state: "WAITINGSTAGE1", queueLength: null, chargeRequestId: "F7" }
    });
  });

  it("keeps a real queue length and blanks an empty request id", async () => {
    const { api } = setup(() => envelope({ cur_state: "WAITINGSTAGE1", queue_len: 2, charge_id: "" }));

    const result = await api.previewQueue();

    expect(result).toEqual({
      success: true,
      data: { state: "WAITINGSTAGE1", queueLength: 2, chargeRequestId: null }
    });
  });

  it("rejects an unknown charging state as a protocol error", async () => {
    const { api } = setup(() => envelope({ cur_state: "EXPLODED", queue_len: 0, charge_id: null }));

    const result = await api.previewQueue();

    expect(result).toMatchObject({ success: false, error: { kind: "TransportProtocolError" } });
  });

  it("preserves the server's bill order", async () => {
    const bills = [
      { bill_id: "B3", create_time: "2024-06-01 09:00:00", total_cost: 12.5 },
      { bill_id: "B1", create_time: "2024-06-01 07:00:00", total_cost: 3 },
      { bill_id: "B2", create_time: "2024-06-01 08:00:00", total_cost: "8.00" }
    ];
    const { api, calls } = setup(() => envelope(bills));

    const result = await api.queryBill("2024-06-01 10:00:00");

    expect(calls[0]).toMatchObject({ path: "/user/query_bill", body: { date: "2024-06-01 10:00:00" } });
    expect(result.success && result.data.map((b) => b.bill_id)).toEqual(["B3", "B1", "B2"]);
  });

  it("treats a null bill list as empty", async () => {
    const { api } = setup(() => envelope(null));

    const result = await api.queryBill("2024-06-01");

    expect(result).toEqual({ success: true, data: [] });
  });

  it("queries today's bills using the server's clock", async () => {
    const { api, calls } = setup((req) =>
      req.path === "/time" ? envelope({ datetime: "2024-06-01 10:00:00", timestamp: 1717207200 }) : envelope([])
    );

    const result = await api.queryTodayBills();

    expect(result).toEqual({ success: true, data: [] });
    expect(calls.map((c) => c.path)).toEqual(["/time", "/user/query_bill"]);
    expect(calls[1]?.body).toEqual({ date: "2024-06-01 10:00:00" });
  });

  it("stops before the bill query when the time call fails", async () => {
    const { api, calls } = setup(() => appError("服务器维护中"));

    const result = await api.queryTodayBills();

    expect(result).toMatchObject({ success: false, error: { message: "服务器维护中" } });
    expect(calls).toHaveLength(1);
  });

  it("posts the bill id for order details", async () => {
    const rows = [{ Bill_id: "B1", chargedAamount: 20 }];
    const { api, calls } = setup(() => envelope(rows));

    const result = await api.queryOrderDetail("B1");

    expect(calls[0]).toMatchObject({ path: "/user/query_order_detail", body: { bill_id: "B1" } });
    expect(result).toEqual({ success: true, data: rows });
  });

  it("routes admin operations to the admin endpoints", async () => {
    const { api, calls } = setup((req) => {
      if (req.path === "/admin/query_all_piles_stat") return envelope({ total: 5 });
      if (req.path === "/admin/update_pile") return envelope(null);
      return envelope([{ pile_id: "F1" }]);
    });

    const stat = await api.admin.queryAllPilesStat();
    const report = await api.admin.queryReport();
    const queue = await api.admin.queryQueue();
    const update = await api.admin.updatePile("F1", "SHUTDOWN");

    expect(stat).toEqual({ success: true, data: { total: 5 } });
    expect(report).toEqual({ success: true, data: [{ pile_id: "F1" }] });
    expect(queue).toEqual({ success: true, data: [{ pile_id: "F1" }] });
    expect(update).toEqual({ success: true, data: undefined });
    expect(calls.map((c) => `${c.method} ${c.path}`)).toEqual([
      "GET /admin/query_all_piles_stat",
      "GET /admin/query_report",
      "GET /admin/query_queue",
      "POST /admin/update_pile"
    ]);
    expect(calls[3]?.body).toEqual({ pile_id: "F1", status: "SHUTDOWN" });
  });
});
