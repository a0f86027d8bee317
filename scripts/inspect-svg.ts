#!/usr/bin/env npx tsx
/**
 * Inspect how an SVG file turns into an extrusion profile
 *
 * Prints import issues, the nesting of every polygon and the composed
 * footprint area, and optionally writes a preview SVG of the footprint.
 *
 * Run with: npx tsx scripts/inspect-svg.ts <file.svg> [--target 20] [--depth 2] [--preview out.svg]
 */

import * as fs from 'fs'
import {
  groupFillsWithHoles,
  importSvgProfile,
  profileFootprint,
  OutlineError,
} from '../src'
import type { Point, PolygonWithHoles, SvgProfileOptions } from '../src'

function numberFlag(args: string[], flag: string): number | undefined {
  const index = args.indexOf(flag)
  if (index < 0) return undefined
  const value = parseFloat(args[index + 1])
  return isNaN(value) ? undefined : value
}

function ringToPath(ring: Point[]): string {
  return ring.map((p, i) => `${i === 0 ? 'M' : 'L'}${p.x.toFixed(3)} ${(-p.y).toFixed(3)}`).join(' ') + ' Z'
}

// Target coordinates grow upward, so Y is flipped back for display
function generatePreviewSVG(regions: PolygonWithHoles[], outputPath: string) {
  const all = regions.flatMap(r => [r.outer, ...r.holes]).flat()
  const xs = all.map(p => p.x)
  const ys = all.map(p => -p.y)
  const minX = Math.min(...xs)
  const minY = Math.min(...ys)
  const width = Math.max(...xs) - minX
  const height = Math.max(...ys) - minY
  const pad = Math.max(width, height) * 0.05

  const paths = regions
    .map(r => `  <path d="${[r.outer, ...r.holes].map(ringToPath).join(' ')}" fill="#4a90d9" fill-rule="evenodd"/>`)
    .join('\n')

  const svg = `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${minX - pad} ${minY - pad} ${width + pad * 2} ${height + pad * 2}">
${paths}
</svg>
`
  fs.writeFileSync(outputPath, svg)
  console.log(`Wrote preview SVG to: ${outputPath}`)
}

function inspect(svgPath: string, args: string[]) {
  const content = fs.readFileSync(svgPath, 'utf-8')
  const options: SvgProfileOptions = { name: svgPath }
  const targetSize = numberFlag(args, '--target')
  const depth = numberFlag(args, '--depth')
  if (targetSize !== undefined) options.targetSize = targetSize
  if (depth !== undefined) options.depth = depth

  const result = importSvgProfile(content, options)

  for (const issue of result.issues) {
    const line = `[${issue.type}] ${issue.code}: ${issue.message}${issue.details ? ` (${issue.details})` : ''}`
    if (issue.type === 'error') {
      console.error(line)
    } else {
      console.log(line)
    }
  }

  if (result.status === 'empty') {
    console.log('\nNothing to extrude')
    return
  }

  const { outline, request } = result
  console.log(`\nSource: ${outline.subpaths.length} subpaths, viewBox ${outline.viewBox.minX} ${outline.viewBox.minY} ${outline.viewBox.width} ${outline.viewBox.height}`)
  console.log(`Profile: ${request.polygons.length} polygons, depth ${request.depth}, style ${request.style}`)
  console.log('-'.repeat(60))

  for (const polygon of request.polygons) {
    const indent = '  '.repeat(polygon.level)
    const { minX, minY, maxX, maxY } = polygon.bounds
    console.log(`${indent}#${polygon.sourceIndex} ${polygon.role.padEnd(4)} level ${polygon.level}  ${polygon.points.length} pts  [${minX.toFixed(2)}, ${minY.toFixed(2)}] - [${maxX.toFixed(2)}, ${maxY.toFixed(2)}]`)
  }

  const regions = groupFillsWithHoles(request.polygons)
  const footprint = profileFootprint(request)
  console.log('-'.repeat(60))
  console.log(`Regions: ${regions.length} (${regions.reduce((n, r) => n + r.holes.length, 0)} holes)`)
  console.log(`Footprint: ${footprint.polygons.length} polygons, area ${footprint.area.toFixed(3)}`)

  const previewIndex = args.indexOf('--preview')
  if (previewIndex >= 0 && args[previewIndex + 1]) {
    generatePreviewSVG(footprint.polygons, args[previewIndex + 1])
  }
}

// ============= MAIN =============

function main() {
  const args = process.argv.slice(2)
  const svgPath = args.find((arg, i) => !arg.startsWith('--') && !(i > 0 && args[i - 1].startsWith('--')))

  if (!svgPath) {
    console.error('Usage: npx tsx scripts/inspect-svg.ts <file.svg> [--target 20] [--depth 2] [--preview out.svg]')
    process.exit(1)
  }
  if (!fs.existsSync(svgPath)) {
    console.error(`Error: SVG file not found: ${svgPath}`)
    process.exit(1)
  }

  console.log('='.repeat(60))
  console.log(`Profile inspection: ${svgPath}`)
  console.log('='.repeat(60))

  try {
    inspect(svgPath, args)
  } catch (err) {
    if (err instanceof OutlineError) {
      console.error(`${err.code}: ${err.message}`)
      process.exit(1)
    }
    throw err
  }
}

main()
