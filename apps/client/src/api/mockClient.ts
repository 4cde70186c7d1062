import { createSilentLogger, type Logger } from "@evcs/observability";

import type {
  AdminRecord,
  Bill,
  ChargeModeCode,
  ChargingApi,
  ChargingState,
  ChargingStatus,
  OrderDetail
} from "./client";
import { encodeChargeMode } from "./client";
import { ApiError, fail, ok, type ApiResult } from "./errors";
import { dateOnly, formatDateTime, round2, sleep } from "./mockUtils";

type MockAccount = {
  username: string;
  password: string;
  isAdmin: boolean;
};

type MockOptions = {
  /** Token the simulated server sees in the Authorization header. */
  getToken: () => string | null;
  delayMs?: number;
  /** Polls spent in each waiting/charging stage before the request advances. */
  pollsPerStage?: number;
  accounts?: MockAccount[];
  now?: () => Date;
  logger?: Logger;
};

type MockRequest = {
  id: string;
  username: string;
  mode: ChargeModeCode;
  amount: number;
  batterySize: number;
  state: Exclude<ChargingState, "NOTCHARGING">;
  polls: number;
  /** Pile doing the charging; set only while CHARGING. */
  pileId: string | null;
  beginTime: string | null;
};

type PileStatus = "RUNNING" | "SHUTDOWN" | "UNAVAILABLE";

type MockPile = {
  pileId: string;
  mode: ChargeModeCode;
  status: PileStatus;
  chargeCount: number;
  chargedAmount: number;
  totalCost: number;
};

type MockBill = {
  bill: Bill;
  username: string;
  detail: OrderDetail;
};

export const MOCK_ERRORS = {
  badCredentials: "用户名或密码错误",
  usernameTaken: "用户名已存在",
  invalidInput: "参数错误",
  notLoggedIn: "用户未登录",
  forbidden: "权限不足",
  requestExists: "已有充电请求",
  noRequest: "没有充电请求",
  chargingLocked: "正在充电 无法修改",
  unknownPile: "充电桩不存在",
  badPileStatus: "充电桩状态无效"
} as const;

const POWER_KW: Record<ChargeModeCode, number> = { F: 30, T: 7 };
const UNIT_PRICE = 1.0;
const SERVICE_PRICE = 0.8;
const PILE_STATUSES: readonly PileStatus[] = ["RUNNING", "SHUTDOWN", "UNAVAILABLE"];

function makePiles(): MockPile[] {
  const mk = (pileId: string, mode: ChargeModeCode): MockPile => ({
    pileId,
    mode,
    status: "RUNNING",
    chargeCount: 0,
    chargedAmount: 0,
    totalCost: 0
  });
  return [mk("F1", "F"), mk("F2", "F"), mk("T1", "T"), mk("T2", "T"), mk("T3", "T")];
}

function parsePositive(value: string): number | null {
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : null;
}

/**
 * In-process stand-in for the charging service. Requests walk
 * WAITINGSTAGE1 -> WAITINGSTAGE2 -> CHARGING as the owner polls, then finish with a bill.
 * A mode change passes through CHANGEMODEREQUEUE back to WAITINGSTAGE1; a pile going
 * down mid-charge moves its request to FAULTREQUEUE, then back to WAITINGSTAGE2.
 */
export function createMockClient(options: MockOptions): ChargingApi {
  const delayMs = options.delayMs ?? 0;
  const pollsPerStage = Math.max(1, options.pollsPerStage ?? 2);
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? createSilentLogger();

  const accounts = new Map<string, MockAccount>();
  for (const account of options.accounts ?? []) accounts.set(account.username, account);
  const tokens = new Map<string, string>();
  const requests = new Map<string, MockRequest>();
  const piles = makePiles();
  const bills: MockBill[] = [];
  let seq = 0;

  const respond = async <T>(result: ApiResult<T>): Promise<ApiResult<T>> => {
    if (delayMs > 0) await sleep(delayMs);
    return result;
  };
  const reject = (message: string): Promise<ApiResult<never>> => {
    logger.debug({ message }, "mock request rejected");
    return respond(fail(ApiError.application(message)));
  };

  const caller = (): MockAccount | null => {
    const token = options.getToken();
    if (!token) return null;
    const username = tokens.get(token);
    return username ? accounts.get(username) ?? null : null;
  };

  const waitingAhead = (request: MockRequest): number => {
    let ahead = 0;
    for (const other of requests.values()) {
      if (other.state === "WAITINGSTAGE1" && other.mode === request.mode && other.id < request.id) ahead += 1;
    }
    return ahead;
  };

  const pileFor = (mode: ChargeModeCode): MockPile | undefined =>
    piles.find((p) => p.mode === mode && p.status === "RUNNING");

  const finish = (request: MockRequest): void => {
    const endTime = formatDateTime(now());
    const pile = piles.find((p) => p.pileId === request.pileId);
    const pileId = request.pileId ?? "";
    const chargingCost = round2(request.amount * UNIT_PRICE);
    const serviceCost = round2(request.amount * SERVICE_PRICE);
    const totalCost = round2(chargingCost + serviceCost);
    const chargedTime = round2(request.amount / POWER_KW[request.mode]);
    const billId = `B${String(bills.length + 1).padStart(6, "0")}`;
    const beginTime = request.beginTime ?? endTime;

    if (pile) {
      pile.chargeCount += 1;
      pile.chargedAmount = round2(pile.chargedAmount + request.amount);
      pile.totalCost = round2(pile.totalCost + totalCost);
    }

    bills.push({
      username: request.username,
      bill: {
        bill_id: billId,
        create_time: endTime,
        pile_id: pileId,
        charged_amount: request.amount,
        charged_time: chargedTime,
        begin_time: beginTime,
        end_time: endTime,
        charging_cost: chargingCost,
        service_cost: serviceCost,
        total_cost: totalCost
      },
      detail: {
        car_id: request.username,
        data: dateOnly(endTime),
        Bill_id: billId,
        chargedPileNum: pileId,
        chargedAamount: request.amount,
        chargedDuration: chargedTime,
        StartTime: beginTime,
        EndTime: endTime,
        ChargeFee: chargingCost,
        ServiceFee: serviceCost,
        subtotalFee: totalCost
      }
    });
    requests.delete(request.username);
    logger.debug({ requestId: request.id, billId, pileId }, "mock request billed");
  };

  const moveTo = (request: MockRequest, state: MockRequest["state"]): void => {
    logger.debug({ requestId: request.id, from: request.state, to: state }, "mock request moved");
    request.state = state;
    request.polls = 0;
  };

  const advance = (request: MockRequest): void => {
    request.polls += 1;
    if (request.polls < pollsPerStage) return;
    request.polls = 0;
    switch (request.state) {
      case "WAITINGSTAGE1":
      case "FAULTREQUEUE":
        moveTo(request, "WAITINGSTAGE2");
        break;
      case "CHANGEMODEREQUEUE":
        moveTo(request, "WAITINGSTAGE1");
        break;
      case "WAITINGSTAGE2": {
        const pile = pileFor(request.mode);
        if (!pile) return;
        moveTo(request, "CHARGING");
        request.pileId = pile.pileId;
        request.beginTime = formatDateTime(now());
        break;
      }
      case "CHARGING":
        finish(request);
        break;
    }
  };

  const withUser = async <T>(run: (user: MockAccount) => Promise<ApiResult<T>>): Promise<ApiResult<T>> => {
    const user = caller();
    if (!user) return reject(MOCK_ERRORS.notLoggedIn);
    return run(user);
  };

  const withAdmin = async <T>(run: () => Promise<ApiResult<T>>): Promise<ApiResult<T>> => {
    const user = caller();
    if (!user) return reject(MOCK_ERRORS.notLoggedIn);
    if (!user.isAdmin) return reject(MOCK_ERRORS.forbidden);
    return run();
  };

  const client: ChargingApi = {
    login(username, password) {
      const account = accounts.get(username);
      if (!account || account.password !== password) return reject(MOCK_ERRORS.badCredentials);
      seq += 1;
      const token = `mock-token-${String(seq)}`;
      tokens.set(token, username);
      return respond(ok({ token, isAdmin: account.isAdmin }));
    },
    register(username, password) {
      if (!username.trim() || !password) return reject(MOCK_ERRORS.invalidInput);
      if (accounts.has(username)) return reject(MOCK_ERRORS.usernameTaken);
      accounts.set(username, { username, password, isAdmin: false });
      return respond(ok(undefined));
    },
    serverTime() {
      const date = now();
      return respond(ok({ datetime: formatDateTime(date), timestamp: Math.floor(date.getTime() / 1000) }));
    },

    submitChargingRequest(modeLabel, amount, batterySize) {
      return withUser<void>((user) => {
        if (requests.has(user.username)) return reject(MOCK_ERRORS.requestExists);
        const requireAmount = parsePositive(amount);
        const capacity = parsePositive(batterySize);
        if (requireAmount === null || capacity === null || requireAmount > capacity) {
          return reject(MOCK_ERRORS.invalidInput);
        }
        seq += 1;
        const mode = encodeChargeMode(modeLabel);
        requests.set(user.username, {
          id: `${mode}${String(seq).padStart(4, "0")}`,
          username: user.username,
          mode,
          amount: requireAmount,
          batterySize: capacity,
          state: "WAITINGSTAGE1",
          polls: 0,
          pileId: null,
          beginTime: null
        });
        return respond(ok(undefined));
      });
    },
    editChargingRequest(modeLabel, amount) {
      return withUser<void>((user) => {
        const request = requests.get(user.username);
        if (!request) return reject(MOCK_ERRORS.noRequest);
        if (request.state === "CHARGING") return reject(MOCK_ERRORS.chargingLocked);
        const requireAmount = parsePositive(amount);
        if (requireAmount === null || requireAmount > request.batterySize) return reject(MOCK_ERRORS.invalidInput);
        const mode = encodeChargeMode(modeLabel);
        request.amount = requireAmount;
        if (mode !== request.mode) {
          request.mode = mode;
          moveTo(request, "CHANGEMODEREQUEUE");
        }
        return respond(ok(undefined));
      });
    },
    endChargingRequest() {
      return withUser<void>((user) => {
        const request = requests.get(user.username);
        if (!request) return reject(MOCK_ERRORS.noRequest);
        if (request.state === "CHARGING") {
          finish(request);
        } else {
          requests.delete(user.username);
        }
        return respond(ok(undefined));
      });
    },
    previewQueue() {
      return withUser<ChargingStatus>((user) => {
        const request = requests.get(user.username);
        if (!request) {
          return respond(ok({ state: "NOTCHARGING", queueLength: null, chargeRequestId: null }));
        }
        const snapshot: ChargingStatus = {
          state: request.state,
          queueLength: request.state === "WAITINGSTAGE1" ? waitingAhead(request) : null,
          chargeRequestId: request.id
        };
        advance(request);
        return respond(ok(snapshot));
      });
    },

    queryBill(date) {
      return withUser<Bill[]>((user) => {
        const day = dateOnly(date);
        const rows = bills
          .filter((b) => b.username === user.username && dateOnly(String(b.bill.create_time ?? "")) === day)
          .map((b) => b.bill);
        return respond(ok(rows));
      });
    },
    queryOrderDetail(billId) {
      return withUser<OrderDetail[]>((user) => {
        const rows = bills
          .filter((b) => b.username === user.username && b.bill.bill_id === billId)
          .map((b) => b.detail);
        return respond(ok(rows));
      });
    },
    async queryTodayBills() {
      const time = await client.serverTime();
      if (!time.success) return time;
      return client.queryBill(time.data.datetime);
    },

    admin: {
      queryAllPilesStat() {
        return withAdmin<AdminRecord>(() => {
          const stat: AdminRecord = {
            total: piles.length,
            running: piles.filter((p) => p.status === "RUNNING").length,
            piles: piles.map((p) => ({ pile_id: p.pileId, status: p.status }))
          };
          return respond(ok(stat));
        });
      },
      queryReport() {
        return withAdmin<AdminRecord[]>(() =>
          respond(
            ok(
              piles.map<AdminRecord>((p) => ({
                pile_id: p.pileId,
                cumulative_usage_times: p.chargeCount,
                cumulative_charging_amount: p.chargedAmount,
                cumulative_total_cost: p.totalCost
              }))
            )
          )
        );
      },
      queryQueue() {
        return withAdmin<AdminRecord[]>(() =>
          respond(
            ok(
              [...requests.values()]
                .filter((r) => r.state !== "CHARGING")
                .map<AdminRecord>((r) => ({
                  charge_id: r.id,
                  username: r.username,
                  charge_mode: r.mode,
                  require_amount: r.amount,
                  battery_size: r.batterySize,
                  state: r.state
                }))
            )
          )
        );
      },
      updatePile(pileId, status) {
        return withAdmin<void>(() => {
          const pile = piles.find((p) => p.pileId === pileId);
          if (!pile) return reject(MOCK_ERRORS.unknownPile);
          const next = PILE_STATUSES.find((s) => s === status);
          if (!next) return reject(MOCK_ERRORS.badPileStatus);
          pile.status = next;
          if (next !== "RUNNING") {
            for (const request of requests.values()) {
              if (request.pileId !== pile.pileId) continue;
              moveTo(request, "FAULTREQUEUE");
              request.pileId = null;
              request.beginTime = null;
            }
          }
          return respond(ok(undefined));
        });
      }
    }
  };

  return client;
}
