export const isoNow = (): string => new Date().toISOString();

export const unixNow = (): number => Math.floor(Date.now() / 1000);
