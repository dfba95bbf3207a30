export {
  encodeUnsigned,
  decodeUnsigned,
  decodeUnsignedNumber,
} from "./unsigned.js";

export {
  encodeSigned,
  decodeSigned,
  decodeSignedNumber,
} from "./signed.js";

export {
  classifyUnsigned,
  classifySigned,
  categoryOfHeader,
  encodedLength,
} from "./category.js";

export {
  encodedLengthUnsigned,
  encodedLengthSigned,
} from "./length.js";

export {
  DecodeError,
  type DecodeErrorCode,
  reinterpretSigned,
  reinterpretUnsigned,
} from "./primitives.js";
