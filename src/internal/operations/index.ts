import { Effect } from "effect"
import { emptyTable, registerOperations, type OperationTable } from "../../Operations.js"
import { elementwiseOperations } from "./elementwise.js"
import { functionOperations } from "./functions.js"

export const defaultOperationTable: OperationTable = Effect.runSync(
  registerOperations(emptyTable, [...elementwiseOperations, ...functionOperations]),
)
