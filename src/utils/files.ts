import * as fs from "fs"
import * as path from "path"

/**
 * Extensions supported by the loader.
 */
const allowedExtensions = [".ts", ".mts"]

const isDeclarationFile = (file: string) =>
  file.endsWith(".d.ts") || file.endsWith(".d.mts")

/**
 * Returns a list of path of all files in the given directory
 */
export async function listFiles(dir = "."): Promise<string[]> {
  const res = await Promise.all(
    fs.readdirSync(dir).map(async (file) => {
      const filepath = path.join(dir, file)

      // Ignore node_modules and transpiled typescript
      if (file === "node_modules" || file === "dist") {
        return []
      }

      const stat = fs.statSync(filepath)

      if (stat.isDirectory()) {
        return await listFiles(filepath)
      }

      const ext = path.extname(filepath)
      if (
        allowedExtensions.find((allowedExt) => allowedExt === ext) &&
        !isDeclarationFile(file)
      ) {
        return [filepath]
      }

      return []
    }),
  )

  return res.reduce((p, c) => [...p, ...c], [])
}

/**
 * Expand the directories of `paths` into the source files they contain.
 */
export async function expandFiles(paths: string[]): Promise<string[]> {
  const res = await Promise.all(
    paths.map(async (p) =>
      fs.statSync(p).isDirectory() ? await listFiles(p) : [p],
    ),
  )

  return res.reduce((p, c) => [...p, ...c], []).map((f) => path.resolve(f))
}
