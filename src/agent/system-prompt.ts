import type { ScopeKind } from "../core/scope.js";

export interface PromptContext {
  persona: string;
  scopeKind: ScopeKind;
  timezone: string;
  now: number;
  /** Bot account id, when the bridge has reported it. */
  botId?: string | null;
}

export function buildSystemPrompt(ctx: PromptContext): string {
  const sections: string[] = [];

  // 1. Persona
  sections.push(ctx.persona.trim());

  // 2. Conversation shape
  if (ctx.scopeKind === "group") {
    sections.push(
      "## Conversation\nYou are in a group chat. User messages are prefixed with `[name(id)]` to tell speakers apart. `@<id>` marks a mention" +
        (ctx.botId ? `; \`@<${ctx.botId}>\` is you.` : "."),
    );
  } else {
    sections.push("## Conversation\nYou are in a private chat with one user.");
  }

  // 3. Runtime info
  sections.push(`## Runtime
- Time: ${formatTime(ctx.now, ctx.timezone)}
- Timezone: ${ctx.timezone}`);

  return sections.join("\n\n");
}

export function formatTime(now: number, timezone: string): string {
  try {
    return new Intl.DateTimeFormat("sv-SE", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hour12: false,
    }).format(new Date(now));
  } catch {
    // unknown time zone
    return new Date(now).toISOString();
  }
}
