type LogDetails = Record<string, string | number | boolean>;

function formatRecord(eventName: string, details: LogDetails): string {
  const parts = Object.entries(details).map(([key, value]) => {
    const text = String(value);
    return /\s/.test(text) ? `${key}=${JSON.stringify(text)}` : `${key}=${text}`;
  });
  return [`deskpilot event=${eventName}`, ...parts].join(" ");
}

export function logInfo(eventName: string, details: LogDetails = {}) {
  console.log(formatRecord(eventName, details));
}

export function logWarn(eventName: string, details: LogDetails = {}) {
  console.warn(formatRecord(eventName, details));
}

export function logError(eventName: string, details: LogDetails = {}) {
  console.error(formatRecord(eventName, details));
}

export { formatRecord };
