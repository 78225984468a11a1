export { compileEquation, containsPoint, type CompiledEquation } from "./compiled-equation";
export {
  createZone,
  withEquation,
  zoneToRecord,
  isZoneValid,
  zoneContainsPoint,
  approximateZonePolygon,
  zonesContainingPoint,
  probeZone,
  DEFAULT_PROBE_POINTS,
  type Zone,
  type ProbeHit,
  type ProbeResult,
} from "./zone";
