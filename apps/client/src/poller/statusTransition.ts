import type { ChargingState, ChargingStatus, ServerTime } from "../api/client";

export const STATUS_TEXT: Record<ChargingState, string> = {
  NOTCHARGING: "没有充电请求",
  WAITINGSTAGE1: "在等候区等待",
  WAITINGSTAGE2: "在充电区等待",
  CHARGING: "正在充电",
  CHANGEMODEREQUEUE: "充电模式更改 重新排队",
  FAULTREQUEUE: "充电桩故障"
};

export const CHARGING_FINISHED_MESSAGE = "充电结束 请查询详单";

export const INITIAL_OBSERVATION: ChargingState = "NOTCHARGING";

export type StatusView = {
  state: ChargingState;
  statusText: string;
  /** Blank when the server reports no queue position. */
  queueText: string;
  requestId: string | null;
  serverTime: string;
};

export type Transition = {
  view: StatusView;
  completed: boolean;
  next: ChargingState;
};

export function formatQueueLength(queueLength: number | null): string {
  return queueLength === null ? "" : `前有${String(queueLength)}人`;
}

export function isCompletionEdge(previous: ChargingState, current: ChargingState): boolean {
  return previous === "CHARGING" && current === "NOTCHARGING";
}

export function applyObservation(previous: ChargingState, status: ChargingStatus, time: ServerTime): Transition {
  return {
    view: {
      state: status.state,
      statusText: STATUS_TEXT[status.state],
      queueText: formatQueueLength(status.queueLength),
      requestId: status.chargeRequestId,
      serverTime: time.datetime
    },
    completed: isCompletionEdge(previous, status.state),
    next: status.state
  };
}
