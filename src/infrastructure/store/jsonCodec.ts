import { fromRecords, toRecords } from "../../core/results/resultRecord";
import type { StoreCodec } from "./FileResultRepository";

export const jsonStoreCodec: StoreCodec = {
  encode: (store) => `${JSON.stringify(toRecords(store), null, 2)}\n`,
  decode: (text) => fromRecords(JSON.parse(text))
};
