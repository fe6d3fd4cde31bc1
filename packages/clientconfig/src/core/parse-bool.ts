import { z } from "zod"

const boolString = z.stringbool({
  truthy: ["1", "t", "T", "TRUE", "true", "True"],
  falsy: ["0", "f", "F", "FALSE", "false", "False"],
  case: "sensitive",
})

/**
 * Parses the conventional boolean spellings. Returns null for anything else.
 */
export function parseBool(value: string): boolean | null {
  const result = boolString.safeParse(value)

  return result.success ? result.data : null
}
