import {
  type Description,
  type Parameter,
  type ParameterType,
  ParameterTypeKind,
  type Signature,
  convertToKebabCase,
} from "../introspector/index.js"

/**
 * A command or subcommand listed in an overview.
 */
export type CommandSummary = {
  name: string
  summary?: string
}

type Row = [string, string]

function formatRows(rows: Row[]): string[] {
  const width = Math.max(...rows.map(([left]) => left.length))

  return rows.map(([left, right]) =>
    `  ${left.padEnd(width)}  ${right}`.trimEnd(),
  )
}

function formatDescription(description?: Description): string[] {
  const lines: string[] = []

  if (description?.shortDescription) {
    lines.push("", description.shortDescription)
  }

  if (description?.longDescription) {
    lines.push("", description.longDescription)
  }

  return lines
}

function placeholder(type: ParameterType): string {
  switch (type.kind) {
    case ParameterTypeKind.Boolean:
      return ""
    case ParameterTypeKind.Number:
      return "<number>"
    case ParameterTypeKind.String:
      return type.choices ? `<${type.choices.join("|")}>` : "<string>"
    case ParameterTypeKind.List:
      return `${placeholder(type.element) || "<boolean>"}...`
    case ParameterTypeKind.Unknown:
      return "<value>"
  }
}

function formatFlag(parameter: Parameter): string {
  const flag = `--${convertToKebabCase(parameter.name)}`
  const value = placeholder(parameter.type)

  return value ? `${flag} ${value}` : flag
}

function formatParameterText(parameter: Parameter): string {
  const parts = [parameter.description]

  if (parameter.isRequired) {
    parts.push("(required)")
  } else if (parameter.default !== undefined) {
    parts.push(`(default: ${JSON.stringify(parameter.default)})`)
  }

  if (parameter.isVariadic) {
    parts.push("(repeatable)")
  }

  return parts.filter((part) => part.length > 0).join(" ")
}

/**
 * Help of a callable command: its usage, documentation and flags.
 *
 * @param path The command names leading to the command.
 */
export function formatCommandHelp(
  program: string,
  path: string[],
  signature: Signature,
): string {
  const parameters = signature.parameters
  const lines = [
    `Usage: ${[program, ...path].join(" ")}${parameters.length > 0 ? " [options]" : ""}`,
    ...formatDescription(signature.description),
  ]

  if (parameters.length > 0) {
    lines.push(
      "",
      "Options:",
      ...formatRows(
        parameters.map((parameter) => [
          formatFlag(parameter),
          formatParameterText(parameter),
        ]),
      ),
    )
  }

  return lines.join("\n")
}

export function formatGroupHelp(
  program: string,
  name: string,
  description: Description | undefined,
  subcommands: CommandSummary[],
): string {
  const lines = [
    `Usage: ${program} ${name} <subcommand> [options]`,
    ...formatDescription(description),
  ]

  if (subcommands.length > 0) {
    lines.push("", "Subcommands:", ...formatRows(toRows(subcommands)))
  }

  return lines.join("\n")
}

/**
 * Help of the program: every top level command with its summary.
 */
export function formatOverview(
  program: string,
  commands: CommandSummary[],
): string {
  const lines = [`Usage: ${program} <command> [subcommand] [options]`]

  if (commands.length > 0) {
    lines.push("", "Commands:", ...formatRows(toRows(commands)))
  }

  return lines.join("\n")
}

function toRows(commands: CommandSummary[]): Row[] {
  return commands.map(({ name, summary }) => [name, summary ?? ""])
}
