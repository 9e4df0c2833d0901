import { CommandRegistry } from "../../registry.js"

export const registry = new CommandRegistry()

/**
 * Add two integers.
 *
 * @param a The first integer
 * @param b The second integer
 * @returns The sum
 */
export function foo(a: number, b: number = 5): number {
  return a + b
}
registry.register(foo)

/**
 * Work with words.
 */
@registry.command()
export class Text {
  private readonly suffix = "!"

  /**
   * Shout a word.
   *
   * @param word The word to shout
   * @param excited End with an exclamation mark
   */
  @registry.command()
  shout(word: string, excited?: boolean): string {
    return `${word.toUpperCase()}${excited ? this.suffix : ""}`
  }

  /**
   * Repeat a word.
   *
   * @param word The word to repeat
   * @param times How many times
   * @param separator Put between the words
   */
  @registry.command()
  static repeat(word: string, times: number = 2, separator = " "): string {
    return Array.from({ length: times }, () => word).join(separator)
  }

  whisper(word: string): string {
    return word.toLowerCase()
  }
}

export class Tools {
  /**
   * Greet someone.
   *
   * @param name Who to greet
   * @param greeting How to greet
   */
  @registry.command()
  static greet(name: string, greeting: "hello" | "hi" = "hello"): string {
    return `${greeting} ${name}`
  }
}

/**
 * Sum every value.
 */
export const total = (...values: number[]): number =>
  values.reduce((sum, value) => sum + value, 0)
registry.register(total)

/**
 * Pretend to deploy.
 *
 * @param target Where to deploy
 * @param dryRun Only print what would be done
 */
export async function deploy(
  target: string,
  dryRun = false,
): Promise<{ target: string; dryRun: boolean }> {
  return await Promise.resolve({ target, dryRun })
}
registry.register(deploy)

export function fail(): never {
  throw new Error("boom")
}
registry.register(fail)
