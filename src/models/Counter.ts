import mongoose, { Schema } from 'mongoose';

export interface CounterDocument {
  _id: string;
  seq: number;
}

const counterSchema = new Schema<CounterDocument>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, default: 0 }
  },
  { versionKey: false }
);

export const CounterModel = mongoose.model<CounterDocument>('Counter', counterSchema);
