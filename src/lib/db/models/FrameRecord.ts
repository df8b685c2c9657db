import { Schema, model, type InferSchemaType } from 'mongoose';

const frameRecordSchema = new Schema(
  {
    user_on_file: { type: String, required: true, index: true },
    file_date: { type: Date, required: true, index: true },
    location: { type: String, required: true },
    // "N" or "N-M", as written by formatFrameRange
    frame_range: { type: String, required: true }
  },
  { versionKey: false }
);

export type FrameRecordDocument = InferSchemaType<typeof frameRecordSchema>;

export const FrameRecord = model('FrameRecord', frameRecordSchema, 'frames');
