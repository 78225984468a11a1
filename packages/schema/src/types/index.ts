export {
  ZONE_TYPES,
  ZONE_TYPE_COLORS,
  DEFAULT_ZONE_TYPE,
  DEFAULT_ZONE_OPACITY,
  type ZoneType,
  type ZoneRecord,
  type ZoneSetRecord,
} from "./zone";
