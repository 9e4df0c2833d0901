/**
 * Spelling of a parameter name as a long flag: `dryRun` becomes `dry-run`.
 */
export function convertToKebabCase(input: string): string {
  // Handle empty string case
  if (!input) {
    return ""
  }

  // Split on separators, before an uppercase letter following a lowercase
  // letter or a digit, and before the last capital of an acronym.
  const words = input
    .split(/[^a-zA-Z0-9]+|(?<=[a-z0-9])(?=[A-Z])|(?<=[A-Z])(?=[A-Z][a-z])/g)
    .filter((word) => word.length > 0)

  return words.map((word) => word.toLowerCase()).join("-")
}
