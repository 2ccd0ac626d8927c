/**
 * Builtin functions and the standard library modules that provide them.
 */

import { BuiltinTypeId, type TypeId } from './types.ts'

export const STD_MODULES = ['std.io', 'std.string'] as const

export type StdModule = (typeof STD_MODULES)[number]

export const BuiltinName = {
	Len: 'len',
	Panic: 'panic',
	Print: 'print',
	ToFloat: 'to_float',
	ToInt: 'to_int',
	ToString: 'to_string',
	Write: 'write',
} as const

export type BuiltinName = (typeof BuiltinName)[keyof typeof BuiltinName]

export interface BuiltinDef {
	readonly name: BuiltinName
	/** Module that has to be imported, or null for core builtins */
	readonly module: StdModule | null
	/** Accepted argument types per parameter */
	readonly params: readonly (readonly TypeId[])[]
	readonly returnType: TypeId
	/** Control never comes back from a call */
	readonly diverges: boolean
}

const PRINTABLE = [
	BuiltinTypeId.Int,
	BuiltinTypeId.Float,
	BuiltinTypeId.Bool,
	BuiltinTypeId.String,
] as const

export const BUILTINS: readonly BuiltinDef[] = [
	{
		diverges: false,
		module: 'std.io',
		name: BuiltinName.Print,
		params: [PRINTABLE],
		returnType: BuiltinTypeId.Void,
	},
	{
		diverges: false,
		module: 'std.io',
		name: BuiltinName.Write,
		params: [PRINTABLE],
		returnType: BuiltinTypeId.Void,
	},
	{
		diverges: false,
		module: 'std.string',
		name: BuiltinName.Len,
		params: [[BuiltinTypeId.String]],
		returnType: BuiltinTypeId.Int,
	},
	{
		diverges: false,
		module: 'std.string',
		name: BuiltinName.ToString,
		params: [[BuiltinTypeId.Int, BuiltinTypeId.Float, BuiltinTypeId.Bool]],
		returnType: BuiltinTypeId.String,
	},
	{
		diverges: true,
		module: null,
		name: BuiltinName.Panic,
		params: [[BuiltinTypeId.String]],
		returnType: BuiltinTypeId.Void,
	},
	{
		diverges: false,
		module: null,
		name: BuiltinName.ToFloat,
		params: [[BuiltinTypeId.Int]],
		returnType: BuiltinTypeId.Float,
	},
	{
		diverges: false,
		module: null,
		name: BuiltinName.ToInt,
		params: [[BuiltinTypeId.Float]],
		returnType: BuiltinTypeId.Int,
	},
]

export function getBuiltin(name: string): BuiltinDef | undefined {
	return BUILTINS.find((b) => b.name === name)
}

export function isStdModule(path: string): path is StdModule {
	return STD_MODULES.some((m) => m === path)
}
