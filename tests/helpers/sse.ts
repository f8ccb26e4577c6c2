export interface ParsedSseEvent {
  id: string | null;
  event: string | null;
  data: string[];
}

/**
 * Splits an SSE payload into records and decodes the `id`, `event` and `data`
 * fields. Data lines are kept raw so tests can check escaping before parsing.
 */
export function parseSseStream(stream: string): ParsedSseEvent[] {
  const events: ParsedSseEvent[] = [];
  for (const record of stream.split("\n\n")) {
    if (!record.trim()) {
      continue;
    }
    let id: string | null = null;
    let event: string | null = null;
    const data: string[] = [];
    for (const line of record.split("\n")) {
      if (line.startsWith("id: ")) {
        id = line.slice("id: ".length);
      } else if (line.startsWith("event: ")) {
        event = line.slice("event: ".length);
      } else if (line.startsWith("data: ")) {
        data.push(line.slice("data: ".length));
      }
    }
    events.push({ id, event, data });
  }
  return events;
}
