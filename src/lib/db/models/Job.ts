import { Schema, model, type InferSchemaType } from 'mongoose';

const jobSchema = new Schema(
  {
    script_user: { type: String, required: true },
    machine: { type: String, enum: ['Baselight', 'Flame'], required: true },
    user_on_file: { type: String, required: true, index: true },
    file_date: { type: Date, required: true },
    submitted_date: { type: Date, required: true, default: () => new Date() }
  },
  { versionKey: false }
);

export type JobDocument = InferSchemaType<typeof jobSchema>;

export const Job = model('Job', jobSchema, 'jobs');
