export const Log = {
  enabled: false,
  prefix: '[long-press]',

  debug(...args: unknown[]) {
    if (!this.enabled) return;
    console.debug(this.prefix, ...args);
  },

  warn(...args: unknown[]) {
    console.warn(this.prefix, ...args);
  }
};
