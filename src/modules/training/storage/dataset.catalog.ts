/**
 * Dataset catalog adapters.
 *
 * Dataset versions and their held-out split are produced upstream by the
 * dataset builder; this side only reads them.
 */

import { Schema, model } from 'mongoose';
import type { HeldOutExample } from '../../evaluation/contracts/evaluation.types.js';
import type { DatasetCatalog, DatasetVersion } from '../contracts/collaborators.js';

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

interface DatasetExampleDoc extends HeldOutExample {
  datasetVersionId: string;
  split: 'train' | 'validation' | 'held_out';
}

const DatasetVersionSchema = new Schema<DatasetVersion>(
  {
    id: { type: String, required: true, unique: true },
    tenantId: { type: String, required: true },
    projectId: { type: String, required: true },
    status: { type: String, required: true },
    stats: { type: Schema.Types.Mixed, default: {} },
  },
  { collection: 'dataset_versions', versionKey: false, id: false }
);

const DatasetExampleSchema = new Schema<DatasetExampleDoc>(
  {
    id: { type: String, required: true },
    datasetVersionId: { type: String, required: true },
    split: { type: String, required: true },
    prompt: { type: String, required: true },
    reference: { type: String, required: true },
    context: { type: [String], default: [] },
    expectRefusal: { type: Boolean, default: false },
  },
  { collection: 'dataset_examples', versionKey: false, id: false }
);

DatasetExampleSchema.index({ datasetVersionId: 1, split: 1, id: 1 });

const DatasetVersionModel = model<DatasetVersion>('DatasetVersion', DatasetVersionSchema);
const DatasetExampleModel = model<DatasetExampleDoc>('DatasetExample', DatasetExampleSchema);

export class MongoDatasetCatalog implements DatasetCatalog {
  async getVersion(datasetVersionId: string): Promise<DatasetVersion | null> {
    const doc = await DatasetVersionModel.findOne({ id: datasetVersionId }).lean<DatasetVersion>();
    if (!doc) return null;
    return {
      id: doc.id,
      tenantId: doc.tenantId,
      projectId: doc.projectId,
      status: doc.status,
      stats: doc.stats,
    };
  }

  async getHeldOutExamples(datasetVersionId: string): Promise<HeldOutExample[]> {
    const docs = await DatasetExampleModel.find({ datasetVersionId, split: 'held_out' })
      .sort({ id: 1 })
      .lean<DatasetExampleDoc[]>();
    return docs.map((d) => ({
      id: d.id,
      prompt: d.prompt,
      reference: d.reference,
      context: d.context ?? [],
      expectRefusal: d.expectRefusal ?? false,
    }));
  }
}

export const datasetModels = [DatasetVersionModel, DatasetExampleModel];

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryDatasetCatalog implements DatasetCatalog {
  private versions = new Map<string, DatasetVersion>();
  private heldOut = new Map<string, HeldOutExample[]>();

  put(version: DatasetVersion, heldOutExamples: HeldOutExample[] = []): void {
    this.versions.set(version.id, structuredClone(version));
    this.heldOut.set(version.id, structuredClone(heldOutExamples));
  }

  setStatus(datasetVersionId: string, status: DatasetVersion['status']): void {
    const version = this.versions.get(datasetVersionId);
    if (version) version.status = status;
  }

  async getVersion(datasetVersionId: string): Promise<DatasetVersion | null> {
    const version = this.versions.get(datasetVersionId);
    return version ? structuredClone(version) : null;
  }

  async getHeldOutExamples(datasetVersionId: string): Promise<HeldOutExample[]> {
    return structuredClone(this.heldOut.get(datasetVersionId) ?? []);
  }
}
