import { childNodes, type Node } from "./node"
import { freezePath, isAncestorPath, pathsEqual, type Path } from "./path"

/**
 * Visits every node in document order, passing the path used to reach it.
 */
export function walk(root: Node, visit: (node: Node, path: Path) => void): void {
  const stack: number[] = []
  const go = (node: Node) => {
    visit(node, freezePath(stack))
    const children = childNodes(node.value)
    for (let i = 0; i < children.length; i++) {
      stack.push(i)
      go(children[i])
      stack.pop()
    }
  }
  go(root)
}

/**
 * Side table from anchor name to the path of the node defining it.
 * If a name is defined more than once the later definition wins, as aliases after it refer to it.
 */
export function collectAnchors(root: Node): Map<string, Path> {
  const anchors = new Map<string, Path>()
  walk(root, (node, path) => {
    if (node.anchor !== undefined) {
      anchors.set(node.anchor, path)
    }
  })
  return anchors
}

/**
 * Paths of every alias node referring to `name`.
 */
export function findAliases(root: Node, name: string): Path[] {
  const result: Path[] = []
  walk(root, (node, path) => {
    if (node.value.kind === "alias" && node.value.target === name) {
      result.push(path)
    }
  })
  return result
}

/**
 * The node an alias named `name` refers to, if any.
 */
export function resolveAlias(root: Node, name: string): Node | undefined {
  let found: Node | undefined
  walk(root, (node) => {
    if (node.anchor === name) {
      found = node
    }
  })
  return found
}

/**
 * Anchors defined inside the subtree at `subtreePath`, and nowhere else, that are still
 * referred to by aliases living outside of it, with the number of such aliases.
 */
export function externallyReferencedAnchors(root: Node, subtreePath: Path): Map<string, number> {
  const definedInside = new Set<string>()
  const definedOutside = new Set<string>()
  const outsideTargets: string[] = []

  walk(root, (node, path) => {
    const inside = pathsEqual(subtreePath, path) || isAncestorPath(subtreePath, path)
    if (node.anchor !== undefined) {
      ;(inside ? definedInside : definedOutside).add(node.anchor)
    }
    if (!inside && node.value.kind === "alias") {
      outsideTargets.push(node.value.target)
    }
  })

  const result = new Map<string, number>()
  for (const target of outsideTargets) {
    if (definedInside.has(target) && !definedOutside.has(target)) {
      result.set(target, (result.get(target) ?? 0) + 1)
    }
  }
  return result
}
