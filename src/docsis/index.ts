// Re-export public API
export * from './normalizers/field-normalizers';
export * from './interfaces/reading.interface';
export type * from './dto/channel-records.dto';
export type * from './dto/channel-summaries.dto';
export * from './dto/docsis-statistics.dto';
export * from './decoders/reading-decoder';
export * from './encoders/record-encoders';
export * from './aggregation/channel-aggregator';
export * from './statistics/statistics-composer';
