import { AsyncLocalStorage } from "node:async_hooks";

// The acting user is the chat platform's id, passed through as an opaque string.
const userStore = new AsyncLocalStorage<{ userId: string }>();

export function getUserId(): string {
  const store = userStore.getStore();
  if (!store) {
    throw new Error("getUserId() called outside of auth context");
  }
  return store.userId;
}

export function runWithUser<T>(userId: string, fn: () => T): T {
  return userStore.run({ userId }, fn);
}
