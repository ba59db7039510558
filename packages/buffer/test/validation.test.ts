import assert from "node:assert";
import { describe, it } from "node:test";
import { Type } from "@sinclair/typebox";
import { compileSchema, formatValidationErrors } from "../src/validation.js";

describe("compileSchema", () => {
	const validate = compileSchema(Type.Object({ count: Type.Integer({ minimum: 0 }) }));

	it("narrows valid data", () => {
		const data: unknown = { count: 2 };
		assert.strictEqual(validate(data), true);
		if (validate(data)) {
			assert.strictEqual(data.count, 2);
		}
	});

	it("formats errors with their instance path", () => {
		assert.strictEqual(validate({ count: -1 }), false);
		assert.deepStrictEqual(formatValidationErrors(validate), ["/count: must be >= 0"]);

		assert.strictEqual(validate({}), false);
		assert.deepStrictEqual(formatValidationErrors(validate), ["root: must have required property 'count'"]);
	});
});
