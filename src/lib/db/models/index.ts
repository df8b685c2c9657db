export { Job, type JobDocument } from './Job';
export { FrameRecord, type FrameRecordDocument } from './FrameRecord';
