/* ================================
   SIMPLE LOGGER (Production-Ready)
================================ */

const env = () => process.env.NODE_ENV;

export const logger = {
  error: (...args: unknown[]) => console.error(...args),
  warn: (...args: unknown[]) => console.warn(...args),
  info: (...args: unknown[]) => {
    // test runs keep the console for failures only
    if (env() !== "test") {
      console.log(...args);
    }
  },
  debug: (...args: unknown[]) => {
    const current = env();
    if (current !== "production" && current !== "test") {
      console.log(...args);
    }
  },
};
