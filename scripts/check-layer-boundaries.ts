import { existsSync, readdirSync, readFileSync } from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import ts from 'typescript'

type LayerViolation = {
  importerPath: string
  line: number
  moduleSpecifier: string
  resolvedPath: string
  forbiddenLayer: string
}

type AnalysisResult = {
  violations: LayerViolation[]
}

/** Layers that must stay free of adapters, wiring and user interfaces. */
const RESTRICTED_LAYERS = ['core', 'application']

const FORBIDDEN_LAYERS = ['infrastructure', 'config', 'app', 'interfaces']

function walkFiles(rootDir: string, predicate: (filePath: string) => boolean): string[] {
  if (!existsSync(rootDir)) {
    return []
  }

  const pending = [rootDir]
  const output: string[] = []

  for (let currentDir = pending.pop(); currentDir !== undefined; currentDir = pending.pop()) {
    for (const entry of readdirSync(currentDir, { withFileTypes: true })) {
      const fullPath = path.join(currentDir, entry.name)
      if (entry.isDirectory()) {
        pending.push(fullPath)
      } else if (predicate(fullPath)) {
        output.push(fullPath)
      }
    }
  }

  return output.sort()
}

function isTypeScriptFile(filePath: string): boolean {
  return filePath.endsWith('.ts') && !filePath.endsWith('.d.ts')
}

function resolveImportTarget(importerPath: string, moduleSpecifier: string): string | null {
  if (!moduleSpecifier.startsWith('.')) {
    return null
  }

  const unresolved = path.resolve(path.dirname(importerPath), moduleSpecifier)
  const candidates = [
    unresolved.replace(/\.js$/u, '.ts'),
    unresolved,
    `${unresolved}.ts`,
    path.join(unresolved, 'index.ts'),
  ]

  return candidates.map((candidate) => path.normalize(candidate)).find((candidate) => existsSync(candidate)) ?? null
}

function isUnderDir(targetPath: string, dirPath: string): boolean {
  const relative = path.relative(dirPath, targetPath)
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
}

function moduleSpecifiersOf(sourceFile: ts.SourceFile): ts.StringLiteral[] {
  const specifiers: ts.StringLiteral[] = []
  for (const statement of sourceFile.statements) {
    if (
      (ts.isImportDeclaration(statement) || ts.isExportDeclaration(statement)) &&
      statement.moduleSpecifier &&
      ts.isStringLiteral(statement.moduleSpecifier)
    ) {
      specifiers.push(statement.moduleSpecifier)
    }
  }
  return specifiers
}

export function analyzeLayerBoundaries(repoRoot: string): AnalysisResult {
  const srcRoot = path.join(repoRoot, 'src')
  const forbiddenRoots = FORBIDDEN_LAYERS.map((layer) => ({ layer, root: path.join(srcRoot, layer) }))
  const restrictedFiles = RESTRICTED_LAYERS.flatMap((layer) => walkFiles(path.join(srcRoot, layer), isTypeScriptFile))
  const violations: LayerViolation[] = []

  for (const filePath of restrictedFiles) {
    const sourceFile = ts.createSourceFile(filePath, readFileSync(filePath, 'utf8'), ts.ScriptTarget.Latest, true)

    for (const specifier of moduleSpecifiersOf(sourceFile)) {
      const resolvedPath = resolveImportTarget(filePath, specifier.text)
      if (!resolvedPath) continue

      const forbidden = forbiddenRoots.find(({ root }) => isUnderDir(resolvedPath, root))
      if (!forbidden) continue

      violations.push({
        importerPath: filePath,
        line: sourceFile.getLineAndCharacterOfPosition(specifier.getStart(sourceFile)).line + 1,
        moduleSpecifier: specifier.text,
        resolvedPath,
        forbiddenLayer: forbidden.layer,
      })
    }
  }

  return { violations }
}

function toRelativePath(repoRoot: string, filePath: string): string {
  return path.relative(repoRoot, filePath).replace(/\\/gu, '/')
}

export function runCli(argv: readonly string[] = process.argv.slice(2)): number {
  const rootFlagIndex = argv.indexOf('--root')
  const rootArg = rootFlagIndex >= 0 ? argv[rootFlagIndex + 1] : undefined
  const repoRoot = rootArg ? path.resolve(rootArg) : process.cwd()

  const result = analyzeLayerBoundaries(repoRoot)
  if (result.violations.length === 0) {
    console.log('No layer boundary violations found for src/core and src/application.')
    return 0
  }

  console.error('Disallowed layer imports detected:')
  for (const violation of result.violations) {
    const importerPath = toRelativePath(repoRoot, violation.importerPath)
    const resolvedPath = toRelativePath(repoRoot, violation.resolvedPath)
    console.error(
      `- ${importerPath}:${violation.line} imports "${violation.moduleSpecifier}" from ${violation.forbiddenLayer} (resolved to ${resolvedPath})`
    )
  }
  return 1
}

const isMainModule =
  typeof process.argv[1] === 'string' && import.meta.url === pathToFileURL(process.argv[1]).href

if (isMainModule) {
  process.exitCode = runCli()
}
