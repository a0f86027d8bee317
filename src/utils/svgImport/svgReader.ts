// SVG document reader - collects path and shape outlines from SVG source text

import { parse } from 'svg-parser'
import type { ElementNode, Node, RootNode } from 'svg-parser'
import { TESSELLATION } from '../../constants'
import { SvgReadError } from '../errors'
import { isPrimitiveShapeKind, readShapeElement, shapeToPoints } from '../geometry/shapes'
import type { AttributeSource } from '../geometry/shapes'
import type { Point } from '../geometry/types'
import { parsePathData } from '../pathData/interpreter'
import type { RecoveryNote } from '../pathData/interpreter'
import { parseDimension, resolveViewBox } from '../outline/viewBoxUtils'
import type { ImportIssue, SvgReadOptions, SvgReadResult } from './types'

function isElement(node: Node | string): node is ElementNode {
  return typeof node !== 'string' && node.type === 'element'
}

// Tag name without a namespace prefix, lowercased
function localTagName(node: ElementNode): string {
  const tagName = node.tagName || ''
  return tagName.slice(tagName.indexOf(':') + 1).toLowerCase()
}

// svg-parser turns numeric attribute values into numbers; hand them back as text
function asAttributeSource(node: ElementNode): AttributeSource {
  const properties = node.properties || {}
  return {
    localName: localTagName(node),
    getAttribute: name => (Object.hasOwn(properties, name) ? String(properties[name]) : null),
  }
}

function parseSvgRoot(svgText: string): ElementNode {
  let document: RootNode
  try {
    document = parse(svgText)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new SvgReadError(`Failed to parse SVG: ${message}`, [message])
  }

  const root = document.children.find(isElement)
  if (!root || localTagName(root) !== 'svg') {
    throw new SvgReadError('No SVG element found in content')
  }
  return root
}

// Every element below `node`, in document order
function descendants(node: ElementNode, into: ElementNode[] = []): ElementNode[] {
  for (const child of node.children) {
    if (!isElement(child)) continue
    into.push(child)
    descendants(child, into)
  }
  return into
}

function noteToIssue(note: RecoveryNote, index: number): ImportIssue {
  if (note.kind === 'argument-underflow') {
    return {
      type: 'info',
      code: 'ARGUMENT_UNDERFLOW',
      message: `Path ${index}: "${note.command}" is missing arguments; ${note.dropped} trailing number(s) dropped`,
      details: `offset ${note.offset}`,
    }
  }
  return {
    type: 'info',
    code: 'DEGENERATE_ARC',
    message: `Path ${index}: arc drawn as a straight line (${note.reason})`,
    details: `offset ${note.offset}`,
  }
}

/**
 * Read every path and primitive shape in an SVG document into one outline.
 *
 * A path with a grammar error is skipped and reported; the rest of the
 * document is still read. A document with nothing drawable is `empty`.
 *
 * @throws SvgReadError when the text is not an SVG document
 */
export function readSvgOutline(svgText: string, options: SvgReadOptions = {}): SvgReadResult {
  const issues: ImportIssue[] = []
  const root = parseSvgRoot(svgText)
  const svg = asAttributeSource(root)
  const { name, ellipseSamples = TESSELLATION.ELLIPSE_SAMPLES, ...interpretOptions } = options

  const width = svg.getAttribute('width')
  const height = svg.getAttribute('height')
  const subpaths: Point[][] = []

  let pathIndex = 0
  for (const node of descendants(root)) {
    const element = asAttributeSource(node)
    const tagName = element.localName

    if (tagName === 'path') {
      const index = pathIndex++
      const d = element.getAttribute('d') || ''
      if (!d.trim()) continue

      const parsed = parsePathData(d, interpretOptions)
      if (parsed.status === 'error') {
        issues.push({
          type: 'error',
          code: parsed.error.code,
          message: `Path ${index}: ${parsed.error.message}`,
          details: parsed.error.fragment,
        })
        continue
      }

      subpaths.push(...parsed.subpaths)
      issues.push(...parsed.notes.map(note => noteToIssue(note, index)))
      continue
    }

    if (isPrimitiveShapeKind(tagName)) {
      const shape = readShapeElement(element)
      const points = shape ? shapeToPoints(shape, ellipseSamples) : []
      if (points.length === 0) {
        issues.push({ type: 'warning', code: 'EMPTY_SHAPE', message: `<${tagName}> has no drawable outline` })
        continue
      }
      subpaths.push(points)
    }
  }

  if (subpaths.length === 0) {
    return { status: 'empty', issues }
  }

  return {
    status: 'ok',
    outline: {
      name,
      subpaths,
      width: parseDimension(width),
      height: parseDimension(height),
      viewBox: resolveViewBox({ viewBox: svg.getAttribute('viewBox'), width, height }),
    },
    issues,
  }
}
