/**
 * Lambda: `[100][0x00][expression as string]`
 * Projection: `[104][count:int32][parameter]...`
 */

import { TypeTag } from '@/protocol/types/type-tags.js'
import { Lambda, Projection } from '@/protocol/types/values.js'
import { serialize, type WriteContext, type WriterRegistration } from '@/protocol/writer/context.js'
import { writeString } from '@/protocol/writer/strings.js'

export function writeLambda(ctx: WriteContext, lambda: Lambda): void {
	// Empty context namespace
	ctx.encoder.writeInt8(TypeTag.Lambda).writeUInt8(0)
	writeString(ctx, lambda.expression)
}

export function writeProjection(ctx: WriteContext, projection: Projection): void {
	ctx.encoder.writeInt8(TypeTag.Projection).writeInt32(projection.parameters.length)
	for (const parameter of projection.parameters) {
		ctx.write(parameter)
	}
}

export const functionWriters: readonly WriterRegistration[] = [
	serialize(Lambda, writeLambda),
	serialize(Projection, writeProjection),
]
