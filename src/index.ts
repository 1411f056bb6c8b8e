/**
 * @module mlir-scribe
 *
 * 在内存中构造 IR，并渲染为通用（generic）文本形式，交由外部 IR 工具链消费。
 *
 * @example 基础用法
 * ```typescript
 * import { Ir, Attr, BuildSession, counterIdGenerator, printModule } from 'mlir-scribe';
 *
 * const session = new BuildSession(0, counterIdGenerator());
 * const c = session.build(
 *   session.operation('arith.constant')
 *     .withResultTypes([Ir.I32])
 *     .withAttrs({ value: Attr.Int(null, 42) })
 * );
 * console.log(printModule(Ir.Module([c])));
 * // module {
 * //   %0 = "arith.constant"() {value = 42} : () -> i32
 * // }
 * ```
 */

export * from './core/index.js';
export * from './diagnostics/index.js';
export { ConfigService } from './config/config-service.js';
export { Logger, LogLevel, createLogger } from './utils/logger.js';
export type { LogMetadata } from './utils/logger.js';
export type { Position, Span, Location } from './types.js';
export type { Ir as IrModel } from './types.js';
