import { createStore, type StoreApi } from "zustand/vanilla";

export type SessionState = {
  token: string;
  isAdmin: boolean;
};

export type SessionStore = {
  setSession: (token: string, isAdmin: boolean) => void;
  clearSession: () => void;
  currentToken: () => string;
  isAuthenticated: () => boolean;
  isAdmin: () => boolean;
  subscribe: (listener: (state: SessionState, prev: SessionState) => void) => () => void;
};

const signedOut: SessionState = { token: "", isAdmin: false };

/**
 * In-memory session holder. Nothing is persisted; a restart starts signed out.
 * An empty token means unauthenticated, and `isAdmin` is only meaningful next to a token.
 */
export function createSessionStore(): SessionStore {
  const store: StoreApi<SessionState> = createStore<SessionState>()(() => ({ ...signedOut }));

  return {
    setSession: (token, isAdmin) => {
      if (!token) {
        store.setState({ ...signedOut });
        return;
      }
      store.setState({ token, isAdmin });
    },
    clearSession: () => {
      store.setState({ ...signedOut });
    },
    currentToken: () => store.getState().token,
    isAuthenticated: () => store.getState().token.length > 0,
    isAdmin: () => {
      const state = store.getState();
      return state.token.length > 0 && state.isAdmin;
    },
    subscribe: (listener) => store.subscribe(listener)
  };
}
