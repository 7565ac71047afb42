// @mapsexpr/lookups
// Built-in selectors and map kinds for message contexts.

export * from "./selectors/message_selectors";
export * from "./maps/map_source";
export * from "./maps/map_kinds";
export * from "./resolvers";
