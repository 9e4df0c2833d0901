/**
 * Expose the decorator publicly, so they insert data into the global registry.
 */
import { registry } from "./registry.js"

/**
 * The definition of the `@command()` decorator.
 *
 * On a class, the class becomes a command whose subcommands are its
 * methods decorated with `@command()`. On a method of an undecorated class,
 * the method becomes a top level command.
 */
export const command = registry.command

/**
 * Register a plain function as a top level command named after the function.
 */
export const register = registry.register
