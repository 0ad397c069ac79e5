export type CapstoneLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * Where the x (time) values of a channel come from: a second record file,
 * or a constant sampling interval.
 */
export type IndependentAxis =
    | { kind: 'file'; fileRef: string }
    | { kind: 'interval'; interval: number };

export interface ChannelDescriptor {
    /** `MeasurementName`, suffixed with `-ChannelIDName` when the source has one. */
    readonly name: string;
    readonly unit: string;
    readonly dataFileRef: string;
    /** Record count advertised by the index (`DataCacheDataSize`). */
    readonly sampleCount: number;
    readonly measurementName: string;
    readonly channelIdName: string | null;
    /** Capstone run the samples belong to (`DataGroupNumber`). */
    readonly groupNumber: number;
    readonly independent: IndependentAxis | null;
}

export interface DecodedChannel extends ChannelDescriptor {
    readonly samples: readonly number[];
    /** Null when the index gives no independent axis. */
    readonly time: readonly number[] | null;
}

export interface CurveFit {
    intercept: number;
    slope: number;
}

export interface Dataset {
    /** Path or label of the archive the data was read from. */
    readonly source: string;
    readonly channels: readonly DecodedChannel[];
    /** Linear fits keyed by run number. */
    readonly curveFits: ReadonlyMap<number, CurveFit>;
}

export interface RunGroup {
    groupNumber: number;
    channels: DecodedChannel[];
}

export type RecordDecoderOptions = {
    /** Bytes per record (default 12). The value is always the trailing 8 bytes. */
    recordSize?: number;
    /** Byte order of the stored doubles (default true). */
    littleEndian?: boolean;
};

export type MissingDataMode = 'error' | 'skip';

export type LoaderOptions = {
    /**
     * What to do when the index references an entry the archive lacks.
     * - 'error' (default): throw ArchiveError
     * - 'skip': drop the channel and warn
     */
    missingData?: MissingDataMode;
    /** Byte order of the stored doubles (default true). */
    littleEndian?: boolean;
    logger?: CapstoneLogger | null;
};

export type CsvOptions = {
    /** Character replacing `.` in numbers. Default `.`. */
    decimalSeparator?: string;
    /** Character between cells. Default `,`. */
    cellSeparator?: string;
    /** Emit a `<name> [time]` column before each channel. Default false. */
    includeTime?: boolean;
};

export type PlotOptions = {
    title?: string;
    /** Plotly bundle source to inline. Read from `plotly.js-dist-min` when omitted. */
    plotlyBundle?: string;
};

export type WriteOptions = {
    logger?: CapstoneLogger | null;
};
