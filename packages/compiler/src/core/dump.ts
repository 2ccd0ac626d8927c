/**
 * Indented text rendering of an AST, one node per line.
 *
 *   Program @1:1
 *     ModuleDecl @1:1
 *       Name hello @1:8
 */

import type { StringStore } from './context.ts'
import { type AstNode, childrenOf, NodeKind } from './nodes.ts'

const KIND_NAMES: ReadonlyMap<number, string> = new Map(
	Object.entries(NodeKind).map(([name, kind]): [number, string] => [kind, name])
)

function detailOf(node: AstNode, strings: StringStore): string | null {
	switch (node.kind) {
		case NodeKind.Name:
		case NodeKind.Identifier:
			return strings.get(node.nameId)
		case NodeKind.TypeRef:
			return node.name
		case NodeKind.LetStatement:
			return node.mutable ? 'var' : 'let'
		case NodeKind.IntLiteral:
		case NodeKind.FloatLiteral:
			return node.text
		case NodeKind.StringLiteral:
			return JSON.stringify(node.value)
		case NodeKind.BoolLiteral:
			return String(node.value)
		case NodeKind.UnaryExpr:
		case NodeKind.BinaryExpr:
		case NodeKind.LogicalExpr:
			return node.operator
		default:
			return null
	}
}

export function formatAst(root: AstNode, strings: StringStore): string {
	const lines: string[] = []
	const visit = (node: AstNode, depth: number): void => {
		const detail = detailOf(node, strings)
		const label = KIND_NAMES.get(node.kind) ?? `Node${node.kind}`
		const text = detail === null ? label : `${label} ${detail}`
		lines.push(`${'  '.repeat(depth)}${text} @${node.span.line}:${node.span.column}`)
		for (const child of childrenOf(node)) visit(child, depth + 1)
	}
	visit(root, 0)
	return lines.join('\n')
}
