import { DEBUG_PIPELINE } from "@/config/debug";

export const isDev = () => process.env.NODE_ENV !== "production";

export const dlog = (...args: unknown[]) => {
  if (isDev() && DEBUG_PIPELINE) console.log(...args);
};

export const dwarn = (...args: unknown[]) => {
  if (isDev()) console.warn(...args);
};
