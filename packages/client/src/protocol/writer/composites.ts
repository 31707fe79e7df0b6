/**
 * Dictionaries and tables
 *
 * Dictionary / keyed table: `[99][keys][values]`
 * Table: `[98][attr][99][symbol list of names][0][attr][count:int32][column]...`
 *
 * Cardinality of keys against values, and of names against columns, is the caller's
 * responsibility; nothing here checks it.
 */

import { TypeTag } from '@/protocol/types/type-tags.js'
import { Dictionary, KeyedTable, Table } from '@/protocol/types/values.js'
import { serialize, type WriteContext, type WriterRegistration } from '@/protocol/writer/context.js'
import { writeList } from '@/protocol/writer/lists.js'

export function writeDictionary(ctx: WriteContext, dictionary: Dictionary | KeyedTable): void {
	ctx.encoder.writeInt8(TypeTag.Dictionary)
	ctx.write(dictionary.keys)
	ctx.write(dictionary.values)
}

export function writeTable(ctx: WriteContext, table: Table): void {
	ctx.encoder.writeInt8(TypeTag.Table).writeUInt8(0).writeInt8(TypeTag.Dictionary)
	writeList(ctx, table.names, TypeTag.Symbol)

	ctx.encoder.writeInt8(TypeTag.GeneralList).writeUInt8(0).writeInt32(table.columns.length)
	table.columns.forEach((column, index) => {
		// Declared type wins over inference so empty columns keep it
		writeList(ctx, column, table.meta[index])
	})
}

export const compositeWriters: readonly WriterRegistration[] = [
	serialize(Dictionary, writeDictionary),
	serialize(KeyedTable, writeDictionary),
	serialize(Table, writeTable),
]
