/**
 * Signal name ↔ handler name rule: "fired" ↔ "onFired"
 */

export function handlerNameFor(signal: string): string {
  return signal.length === 0
    ? 'on'
    : `on${signal.charAt(0).toUpperCase()}${signal.slice(1)}`;
}

/**
 * Inverse of handlerNameFor; undefined for names that don't follow the rule
 */
export function signalNameFor(handlerName: string): string | undefined {
  if (!/^on[A-Z]/.test(handlerName)) return undefined;
  const rest = handlerName.slice(2);
  return `${rest.charAt(0).toLowerCase()}${rest.slice(1)}`;
}
