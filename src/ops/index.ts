/**
 * Stream operators, consumers and the pipeline driver.
 */

export { BaseConsumer, ProducingConsumer } from './consumer';
export type { StreamConsumer } from './consumer';
export { CollectorOperator, ProducingOperator, isCollector } from './operator';
export type { PreparedStage, StreamOperator } from './operator';
export { OperatorStream } from './operator-stream';
export { StageStream, closeAfterFailure } from './stream';
export { openPipeline, runPipeline } from './pipeline';
export { Filter, FilterConsumer } from './filter';
export type { FilterOptions } from './filter';
export { Limit, LimitConsumer } from './limit';
export { Select, SelectConsumer, Rename, PassThroughConsumer } from './select';
export { Move } from './move';
export { Insert, InsertConsumer, spreadValue } from './insert';
export { Update, UpdateConsumer } from './update';
export { Sample, SampleConsumer } from './sample';
export type { SampleOptions } from './sample';
export {
  Collect,
  Collector,
  CollectorConsumer,
  DataFrame,
  DataFrameConsumer,
  Distinct,
  DistinctConsumer,
  RowCount,
  RowCountConsumer,
} from './collect';
export { Write, WriteConsumer } from './write';
export { groupBy } from './groupby';
export type { GroupKey } from './groupby';
export { Aggregate, aggregate } from './aggregate';
export type { AggregateResult, AggregateSpec, ColumnAggregate, GroupAggregate } from './aggregate';
