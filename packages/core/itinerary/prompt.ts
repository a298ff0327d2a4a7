/**
 * Interpreter system instruction: fixed parsing rules plus the user's context
 * blocks (saved places, calendar, contacts). Each block is appended only when
 * it has entries.
 */

import type { CalendarEvent, ContactAddress, SavedPlace } from "@shared/schema";

export const MAX_CALENDAR_EVENTS = 5;
export const CALENDAR_HORIZON_HOURS = 48;
export const MAX_CONTACTS = 10;

export const ITINERARY_RULES = `You are a driving itinerary assistant. The user describes where they want to drive: destinations, errands, stops along the way, route preferences, or any combination.

Return a JSON object with exactly this structure:
{
  "origin": "starting address, or null",
  "stops": [
    {
      "id": "a UUID",
      "address": "full street address when known, otherwise the best geocodable description",
      "label": "short display name (Costco, Home, Airport)",
      "notes": "context the user gave about this stop, or null",
      "stopType": "specific or search",
      "searchQuery": "what to search for when stopType is search, otherwise null",
      "openTime": "HH:MM 24h when a time constraint is mentioned, otherwise null",
      "closeTime": "HH:MM 24h when a time constraint is mentioned, otherwise null",
      "dwellMinutes": 20,
      "estimatedArrival": null,
      "driveMinutesFromPrev": null,
      "hasConflict": false
    }
  ],
  "preferences": {
    "scenic": false,
    "avoidHighways": false,
    "avoidTolls": false,
    "avoidFerries": false,
    "preferenceNotes": "other route preference context, or null"
  },
  "notes": "warnings, or null"
}

Stop types:
- "specific": an exact address or a well-known named place that can be geocoded ("123 Main St", "SFO airport", "Costco"). Put the most complete address you can infer in address.
- "search": a kind of place along the way rather than a particular one ("a Starbucks", "get gas", "somewhere for lunch"). Set searchQuery to the search term ("Starbucks", "gas station", "restaurant") and repeat it in address as a placeholder.

Splitting stops:
- Commas, "then", "and then", "after that" and "on the way" separate stops.
- Keep the user's order. A stop mentioned "on the way" goes before the destination it leads to.
- A street or area attached to an errand ("dry cleaning on University Ave") belongs to that stop.

Time windows:
- "before 5", "by 3pm" -> closeTime. "after 10", "opens at 9" -> openTime. "at 2pm" -> openTime and closeTime around that time.

Dwell time:
- Default 20 minutes. "quick stop" -> 5, "grab coffee" -> 10, "lunch" or "dinner" -> 45.

Route preferences:
- "scenic route", "take the scenic way" -> scenic: true and avoidHighways: true
- "avoid tolls", "no toll roads" -> avoidTolls: true
- "avoid the freeway", "no highways" -> avoidHighways: true
- "avoid ferries" -> avoidFerries: true
- "fastest route", "take the highway" -> all false
- Any other route context goes in preferenceNotes.

Saved places:
- "home", "my house" -> the saved Home address. "work", "the office" -> the saved Work address.
- A saved favorite mentioned by name -> that saved address.
- Saved places are always stopType "specific".

Return ONLY valid JSON, no markdown, no explanation.
If no destination is found return {"origin": null, "stops": [], "preferences": null, "notes": "No destinations found"}`;

export interface PromptContext {
  savedPlaces?: SavedPlace[];
  calendarEvents?: CalendarEvent[];
  contacts?: ContactAddress[];
  /** Reference time for the calendar horizon */
  now?: Date;
}

const EVENT_TIME_FORMAT = new Intl.DateTimeFormat("en-US", {
  weekday: "short",
  hour: "numeric",
  minute: "2-digit",
});

/**
 * Events with a location starting between now and the horizon, soonest first.
 */
export function upcomingEvents(events: CalendarEvent[], now: Date): CalendarEvent[] {
  const start = now.getTime();
  const end = start + CALENDAR_HORIZON_HOURS * 60 * 60 * 1000;
  return events
    .filter((event) => event.location.trim().length > 0)
    .filter((event) => {
      const at = event.startDate.getTime();
      return at >= start && at <= end;
    })
    .sort((a, b) => a.startDate.getTime() - b.startDate.getTime())
    .slice(0, MAX_CALENDAR_EVENTS);
}

/**
 * Contacts with an address, those named in the prompt first, bounded.
 */
export function relevantContacts(contacts: ContactAddress[], promptText: string): ContactAddress[] {
  const prompt = promptText.toLowerCase();
  const withAddress = contacts.filter((c) => c.name.trim() && c.address.trim());
  const mentioned = withAddress.filter((c) => {
    const first = c.name.trim().split(/\s+/)[0].toLowerCase();
    return first.length > 1 && new RegExp(`\\b${escapeRegExp(first)}\\b`).test(prompt);
  });
  const rest = withAddress.filter((c) => !mentioned.includes(c));
  return [...mentioned, ...rest].slice(0, MAX_CONTACTS);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function buildSystemInstruction(promptText: string, context: PromptContext = {}): string {
  let system = ITINERARY_RULES;

  const places = (context.savedPlaces ?? []).filter((p) => p.address.trim());
  if (places.length > 0) {
    const lines = places.map((p) => `${p.name}: ${p.address}`).join("\n");
    system += `\n\nUser's saved places:\n${lines}`;
  }

  const events = upcomingEvents(context.calendarEvents ?? [], context.now ?? new Date());
  if (events.length > 0) {
    const lines = events
      .map((e) => `${e.title} at ${EVENT_TIME_FORMAT.format(e.startDate)}: ${e.location}`)
      .join("\n");
    system += `\n\nUpcoming calendar events (use these locations when the user mentions "my meeting", "the dentist", "my appointment" and the like):\n${lines}`;
  }

  const contacts = relevantContacts(context.contacts ?? [], promptText);
  if (contacts.length > 0) {
    const lines = contacts.map((c) => `${c.name}: ${c.address}`).join("\n");
    system += `\n\nUser's contacts with addresses (use when the user mentions a person by name):\n${lines}`;
  }

  return system;
}
