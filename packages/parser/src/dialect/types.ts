/**
 * Field labels inside one test-case struct literal.
 */
export interface FieldLabels {
    /** Label of the quoted case name */
    name: string;
    /** Label of the expression under test (raw or escaped string) */
    expression: string;
    /** Label of the expected value */
    expected: string;
    /**
     * Other labels that may follow the expected value. A top-level comma
     * followed by one of these ends the value.
     */
    terminators: string[];
}

/**
 * Surface conventions of the test source being scanned.
 *
 * Everything the extractors match by name lives here, so a sibling dialect
 * (another table layout or result package) is a configuration change.
 */
export interface Dialect {
    /** Test functions are identifiers starting with this prefix */
    functionPrefix: string;
    /** Type of the single harness parameter, e.g. `*testing.T` */
    harnessParameterType: string;
    fields: FieldLabels;
    /** Calls of the form `name(handle, inner)` whose value is `inner` */
    wrappers: string[];
    /** Package qualifier of the result constructors (`result.List{...}`) */
    resultPackage: string;
    /** Package qualifier of units and precisions (`model.Day`) */
    modelPackage: string;
    /** Date constructor nested inside DateTime/Date/Time literals */
    dateConstructor: string;
    /** 64-bit integer conversion call */
    longConstructor: string;
    /** 64-bit float conversion call */
    floatConstructor: string;
    /** Named integer constants resolved to their values */
    integerConstants: Record<string, number>;
}

/**
 * Dialect overrides as read from a config file.
 */
export type DialectOverrides = Partial<Omit<Dialect, "fields">> & {
    fields?: Partial<FieldLabels>;
};
