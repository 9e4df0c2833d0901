/**
 * Add two integers.
 *
 * The second integer defaults to 5.
 *
 * @param a The first integer
 * @param b The second integer
 * @returns The sum of both integers
 */
export function foo(a: number, b: number = 5): number {
  return a + b
}

/**
 * Short line.
 *
 * Long line 1.
 * Long line 2.
 *
 * @param name - The name to greet
 * @returns None
 * @throws Error when the name is empty
 */
export function shortAndLong(name: string): string {
  if (!name) {
    throw new Error("empty name")
  }

  return `hello ${name}`
}

export function undocumented(
  flag: boolean,
  count?: number,
  ...tags: string[]
): string {
  return `${flag} ${count ?? 0} ${tags.join(",")}`
}

/**
 * Greet someone.
 *
 * @param nmae The name
 */
export function typo(name: string): string {
  return `hello ${name}`
}

export const LEVEL = "info"

export enum Color {
  Red = "red",
  Blue = "blue",
}

export const arrow = (
  level: "info" | "warn" = LEVEL,
  color: Color = Color.Red,
  items: string[] = ["a", "b"],
  offset = -1,
  ratio: number | null = null,
): string => {
  return [level, color, items.join(","), offset, ratio].join(" ")
}

/**
 * A box of tools.
 *
 * Every tool is a static method.
 */
export class Toolbox {
  /**
   * Say hi.
   *
   * @param name Who to greet
   */
  static hi(name: string): string {
    return `hi ${name}`
  }
}
