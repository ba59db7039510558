import type { Static, TSchema } from "@sinclair/typebox";
import AjvModule from "ajv";

// 处理默认和命名导出
const Ajv = (AjvModule as any).default || AjvModule;

const ajv = new Ajv({ allErrors: true });

export interface SchemaValidator<T> {
	(data: unknown): data is T;
	errors?: Array<{ instancePath: string; message?: string }> | null;
}

/** 编译 TypeBox schema 为类型守卫 */
export function compileSchema<T extends TSchema>(schema: T): SchemaValidator<Static<T>> {
	return ajv.compile(schema);
}

/** 将上一次验证的错误格式化为 "路径: 消息" 列表 */
export function formatValidationErrors<T>(validator: SchemaValidator<T>): string[] {
	return (validator.errors ?? []).map((e) => `${e.instancePath || "root"}: ${e.message ?? "invalid"}`);
}
