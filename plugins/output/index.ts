export { parseJsonOutput } from "./parseJson";
