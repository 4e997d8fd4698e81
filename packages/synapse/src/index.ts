export * from "./types.js";
export {
  type TensorSerializer,
  rawSerializer,
  jsonSerializer,
  f16Serializer,
  serializerRegistry,
  serializer,
  encodeTensor,
  decodeTensor,
} from "./serializers.js";
export {
  type ForwardCall,
  type CallOptions,
  OutputAlreadySetError,
  TextLastHiddenStateForwardCall,
  TextCausalLmForwardCall,
  TextSeq2SeqForwardCall,
  callFromWireRequest,
  failureResponse,
} from "./calls.js";
