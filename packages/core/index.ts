/**
 * ITINERARY DISPATCH CORE — MAIN EXPORTS
 *
 * Prompt -> itinerary -> resolved route -> vehicles.
 */

// Ambient
export * from "./errors";
export * from "./logger";

// LLM client
export * from "./llm/client";

// Interpretation
export * from "./itinerary/decode";
export * from "./itinerary/prompt";
export * from "./itinerary/interpreter";

// Routing
export * from "./routing/resolver";
export * from "./routing/optimizer";

// Fleet
export * from "./fleet/credentials";
export * from "./fleet/backend-client";
export * from "./fleet/decode";
export * from "./fleet/fleet-client";
export * from "./fleet/dispatcher";
export * from "./fleet/range-guard";

// Climate
export * from "./climate/advisor";

// Session
export * from "./session/route-session";
