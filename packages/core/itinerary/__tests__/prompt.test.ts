import { describe, it, expect } from "vitest";
import type { CalendarEvent } from "@shared/schema";
import { ITINERARY_RULES, buildSystemInstruction, relevantContacts, upcomingEvents } from "../prompt";

const NOW = new Date("2026-03-02T08:00:00Z");
const hoursFromNow = (hours: number) => new Date(NOW.getTime() + hours * 60 * 60 * 1000);

describe("upcomingEvents", () => {
  it("keeps located events inside the next 48 hours, soonest first", () => {
    const events: CalendarEvent[] = [
      { title: "Late", location: "Pier 39", startDate: hoursFromNow(30) },
      { title: "Past", location: "Old Place", startDate: hoursFromNow(-1) },
      { title: "Soon", location: "Dentist Office", startDate: hoursFromNow(2) },
      { title: "Call", location: "  ", startDate: hoursFromNow(3) },
      { title: "Too far", location: "Airport", startDate: hoursFromNow(49) },
    ];

    expect(upcomingEvents(events, NOW).map((e) => e.title)).toEqual(["Soon", "Late"]);
  });

  it("caps the list at five events", () => {
    const events = Array.from({ length: 8 }, (_, i) => ({
      title: `E${i}`,
      location: `Place ${i}`,
      startDate: hoursFromNow(i + 1),
    }));

    expect(upcomingEvents(events, NOW).map((e) => e.title)).toEqual(["E0", "E1", "E2", "E3", "E4"]);
  });
});

describe("relevantContacts", () => {
  const contacts = [
    { name: "Alice Chen", address: "1 Oak St" },
    { name: "Bob Stone", address: "2 Elm St" },
    { name: "Carol", address: "" },
    { name: "Dan Park", address: "4 Pine St" },
  ];

  it("puts contacts named in the prompt first and drops those without an address", () => {
    const result = relevantContacts(contacts, "Drop the keys at Dan's place then lunch");

    expect(result.map((c) => c.name)).toEqual(["Dan Park", "Alice Chen", "Bob Stone"]);
  });

  it("matches whole words only", () => {
    const result = relevantContacts([...contacts, { name: "Al", address: "9 Bay St" }], "pick up a salad");
    expect(result.map((c) => c.name)).toEqual(["Alice Chen", "Bob Stone", "Dan Park", "Al"]);

    const named = relevantContacts([...contacts, { name: "Al", address: "9 Bay St" }], "visit Al today");
    expect(named[0].name).toBe("Al");
  });

  it("caps the list at ten contacts", () => {
    const many = Array.from({ length: 12 }, (_, i) => ({ name: `Person${i}`, address: `${i} Road` }));
    expect(relevantContacts(many, "")).toHaveLength(10);
  });
});

describe("buildSystemInstruction", () => {
  it("is just the rules when there is no context", () => {
    expect(buildSystemInstruction("take me to Costco")).toBe(ITINERARY_RULES);
  });

  it("appends saved places", () => {
    const system = buildSystemInstruction("home then work", {
      savedPlaces: [
        { name: "Home", address: "10 Home Rd" },
        { name: "Work", address: "" },
      ],
    });

    expect(system).toBe(`${ITINERARY_RULES}\n\nUser's saved places:\nHome: 10 Home Rd`);
  });

  it("appends calendar and contacts blocks only when they have entries", () => {
    const system = buildSystemInstruction("go see Bob", {
      now: NOW,
      calendarEvents: [{ title: "Old", location: "X", startDate: hoursFromNow(-5) }],
      contacts: [{ name: "Bob Stone", address: "2 Elm St" }],
    });

    expect(system).not.toContain("Upcoming calendar events");
    expect(system.endsWith("User's contacts with addresses (use when the user mentions a person by name):\nBob Stone: 2 Elm St")).toBe(true);
  });

  it("lists upcoming events with their location", () => {
    const system = buildSystemInstruction("go to my meeting", {
      now: NOW,
      calendarEvents: [{ title: "Standup", location: "HQ, 5 Front St", startDate: hoursFromNow(1) }],
    });

    expect(system).toContain("\n\nUpcoming calendar events");
    expect(system).toMatch(/\nStandup at .+: HQ, 5 Front St$/);
  });
});
