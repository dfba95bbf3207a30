export { compareEncoded, encodedEqual } from "./compare.js";
