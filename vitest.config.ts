import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

/*
NOTE we're mapping to absolute paths here to avoid issues where tests seem to be resolved multiple times leading to duplicates
*/

const rootDir = path.dirname(fileURLToPath(import.meta.url))
const packagesDir = path.join(rootDir, './packages/@lexicache')
const packages = fs
  .readdirSync(packagesDir)
  .filter((dir) => fs.statSync(path.join(packagesDir, dir)).isDirectory())
  .map((dir) => path.join(packagesDir, dir))

export default defineConfig({
  test: {
    projects: packages,
  },
})
