import { z } from "zod";
import { defineTool } from "../tool.js";

/**
 * Planning pseudo-tool: the model writes down how it will split a question.
 * Nothing external runs; the plan lands in the transcript as the tool result.
 */
export const decomposeQueryTool = defineTool({
  name: "decompose_query",
  description:
    "Break a complex question into focused sub-questions before researching. " +
    "Use this first for multi-part or comparative questions.",
  input: z.object({
    query: z.string().trim().min(1).describe("The question being researched"),
    sub_questions: z
      .array(z.string().trim().min(1))
      .min(1)
      .max(8)
      .describe("Focused sub-questions, in the order they should be researched"),
  }),
  handler: ({ query, sub_questions }) => ({
    query,
    sub_questions,
    message: `Planned ${sub_questions.length} sub-question(s). Research each, then synthesize.`,
  }),
});
