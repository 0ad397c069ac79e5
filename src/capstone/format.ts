export const INDEX_ENTRY = 'main.xml';

// Record layout:
// [unknown (4 bytes)] [value (f64, 8 bytes)]
// The leading word is never interpreted.
export const RECORD_SIZE = 12;
export const VALUE_SIZE = 8;

export const INTERVAL_PRECISION = 12;

export const XmlTag = {
    DATA_REPOSITORY: 'DataRepository',
    DATA_SOURCE: 'DataSource',
    DATA_SET: 'DataSet',
    DATA_SEGMENT: 'DataSegmentElement',
    DEPENDENT_STORAGE: 'DependentStorageElement',
    INDEPENDENT_STORAGE: 'IndependentStorageElement',
    RENDERER: 'ZRSIndividualRenederer',
    CURVE_FIT_PARAMETER: 'ZCFDICurveFitParameterDefinition',
} as const;

export const XmlAttr = {
    MEASUREMENT_NAME: 'MeasurementName',
    CHANNEL_ID_NAME: 'ChannelIDName',
    GROUP_NUMBER: 'DataGroupNumber',
    DATA_SIZE: 'DataCacheDataSize',
    FILE_NAME: 'FileName',
    INTERVAL: 'IntervalCacheInterval',
    USAGE_NAME: 'ZTDDRBPUsageName',
    CURVE_FIT_RESULT: 'ZCFDICurveFitParameterResultValue',
} as const;

/** Checked in order; the first one present on a DataSource gives the unit. */
export const UNIT_ATTRIBUTES = ['Units', 'UnitName', 'MeasurementUnits'] as const;
