/**
 * Runtime support library interface, version 1.
 *
 * The generator only emits calls to functions listed here, and only the
 * prototypes of the functions a program actually uses. The C header in
 * runtime/rere_runtime.h declares the same surface.
 */

export const RUNTIME_ABI_VERSION = 1

/** Link-time marker every generated program references. */
export const ABI_MARKER = `rere_abi_v${RUNTIME_ABI_VERSION}`

export const STRING_TYPEDEF = 'typedef struct rere_string { const char *data; int64_t len; } rere_string;'

export const RuntimeFunction = {
	Alloc: 'rere_alloc',
	BoolToString: 'rere_bool_to_string',
	FloatToInt: 'rere_float_to_int',
	FloatToString: 'rere_float_to_string',
	IntAdd: 'rere_int_add',
	IntDiv: 'rere_int_div',
	IntMul: 'rere_int_mul',
	IntNeg: 'rere_int_neg',
	IntRem: 'rere_int_rem',
	IntSub: 'rere_int_sub',
	IntToString: 'rere_int_to_string',
	Panic: 'rere_panic',
	PanicAt: 'rere_panic_at',
	Print: 'rere_print',
	RuntimeInit: 'rere_runtime_init',
	RuntimeShutdown: 'rere_runtime_shutdown',
	StringConcat: 'rere_string_concat',
	StringEq: 'rere_string_eq',
	StringLen: 'rere_string_len',
	Write: 'rere_write',
} as const

export type RuntimeFunction = (typeof RuntimeFunction)[keyof typeof RuntimeFunction]

/**
 * Prototypes in declaration order.
 */
export const RUNTIME_PROTOTYPES: ReadonlyArray<readonly [RuntimeFunction, string]> = [
	[RuntimeFunction.RuntimeInit, 'void rere_runtime_init(int argc, char **argv, const char *source_name);'],
	[RuntimeFunction.RuntimeShutdown, 'int rere_runtime_shutdown(int status);'],
	[RuntimeFunction.Alloc, 'void *rere_alloc(size_t size);'],
	[RuntimeFunction.Panic, '_Noreturn void rere_panic(rere_string message);'],
	[
		RuntimeFunction.PanicAt,
		'_Noreturn void rere_panic_at(const char *message, int64_t line, int64_t column);',
	],
	[RuntimeFunction.IntAdd, 'int64_t rere_int_add(int64_t a, int64_t b, int64_t line, int64_t column);'],
	[RuntimeFunction.IntSub, 'int64_t rere_int_sub(int64_t a, int64_t b, int64_t line, int64_t column);'],
	[RuntimeFunction.IntMul, 'int64_t rere_int_mul(int64_t a, int64_t b, int64_t line, int64_t column);'],
	[RuntimeFunction.IntDiv, 'int64_t rere_int_div(int64_t a, int64_t b, int64_t line, int64_t column);'],
	[RuntimeFunction.IntRem, 'int64_t rere_int_rem(int64_t a, int64_t b, int64_t line, int64_t column);'],
	[RuntimeFunction.IntNeg, 'int64_t rere_int_neg(int64_t a, int64_t line, int64_t column);'],
	[RuntimeFunction.FloatToInt, 'int64_t rere_float_to_int(double x, int64_t line, int64_t column);'],
	[RuntimeFunction.StringConcat, 'rere_string rere_string_concat(rere_string a, rere_string b);'],
	[RuntimeFunction.StringEq, 'bool rere_string_eq(rere_string a, rere_string b);'],
	[RuntimeFunction.StringLen, 'int64_t rere_string_len(rere_string s);'],
	[RuntimeFunction.IntToString, 'rere_string rere_int_to_string(int64_t value);'],
	[RuntimeFunction.FloatToString, 'rere_string rere_float_to_string(double value);'],
	[RuntimeFunction.BoolToString, 'rere_string rere_bool_to_string(bool value);'],
	[RuntimeFunction.Print, 'void rere_print(rere_string s);'],
	[RuntimeFunction.Write, 'void rere_write(rere_string s);'],
]

/**
 * Prototypes of the given functions, in table order.
 */
export function prototypesFor(used: ReadonlySet<RuntimeFunction>): string[] {
	return RUNTIME_PROTOTYPES.filter(([name]) => used.has(name)).map(([, prototype]) => prototype)
}
