export { ValueClassifier } from "./classifier";
export type {
    BooleanValue,
    ClassificationRule,
    CompositeKind,
    CompositeValue,
    DecimalValue,
    FloatValue,
    IntegerValue,
    LongValue,
    NullValue,
    OpaqueValue,
    QuantityValue,
    StringValue,
    TemporalKind,
    TemporalValue,
    Value,
} from "./types";
