import type { RouteCalibrationTable, RouteDirection, RouteRule } from "../calibration/routeCalibration";
import { buildPatternKey } from "../calibration/routeCalibration";
import type { Tiploc } from "../models/domain";

const matchDirection = (rule: RouteRule, origin: Tiploc, destination: Tiploc): RouteDirection | null => {
  if (rule.endpoints.length > 0) {
    if (rule.endpoints.includes(origin)) return "up";
    if (rule.endpoints.includes(destination)) return "down";
    return null;
  }
  if (rule.origins.length > 0 || rule.destinations.length > 0) {
    const originMatches = rule.origins.length === 0 || rule.origins.includes(origin);
    const destinationMatches = rule.destinations.length === 0 || rule.destinations.includes(destination);
    return originMatches && destinationMatches ? rule.direction ?? "down" : null;
  }
  return null;
};

const satisfiesVia = (rule: RouteRule, visited: Set<Tiploc>) => {
  const anyOk = rule.viaAny.length === 0 || rule.viaAny.some((tiploc) => visited.has(tiploc));
  const allOk = rule.viaAll.every((tiploc) => visited.has(tiploc));
  return anyOk && allOk;
};

/**
 * Tags a journey with the first matching route rule, judged on its endpoints
 * rather than its intermediate calls since some services run over both
 * branches. Journeys no rule claims get the table's uncalibrated pattern.
 */
export const inferRoutePattern = (locations: readonly Tiploc[], calibration: RouteCalibrationTable): string => {
  const origin = locations[0];
  const destination = locations[locations.length - 1];
  if (origin === undefined || destination === undefined) return calibration.uncalibratedPattern;

  const visited = new Set(locations);
  for (const rule of calibration.rules) {
    const direction = matchDirection(rule, origin, destination);
    if (!direction || !satisfiesVia(rule, visited)) continue;
    return buildPatternKey(rule.route, direction);
  }
  return calibration.uncalibratedPattern;
};
