//
// Binary serialization and the object codec used for archive streams.
//

export {
    BinarySerializer,
    BinaryDeserializer,
    type ISerializer,
    type IDeserializer,
} from './lib/serialization';

export {
    BsonObjectCodec,
    UnsupportedValueError,
    REFERENCE_KEY,
    type IObjectCodec,
    type EncodedValue,
    type PersistentId,
    type ReferenceHook,
    type ReferenceResolver,
} from './lib/object-codec';
