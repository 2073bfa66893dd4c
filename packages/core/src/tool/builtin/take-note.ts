import { z } from "zod";
import { ToolError } from "@citeline/shared";
import { defineTool } from "../tool.js";

export const takeNoteTool = defineTool({
  name: "take_note",
  description: "Save a research finding for the final synthesis, optionally with its source URL.",
  input: z.object({
    note: z.string().describe("The finding to remember"),
    source_url: z.string().optional().describe("URL the finding came from"),
  }),
  handler: ({ note, source_url }, ctx) => {
    const content = note.trim();
    if (!content) {
      throw new ToolError("Note must not be empty", "EMPTY_NOTE");
    }

    const saved = ctx.turn.addNote(content, source_url?.trim() || undefined);
    return { note_id: saved.id, message: "Note saved successfully" };
  },
});
