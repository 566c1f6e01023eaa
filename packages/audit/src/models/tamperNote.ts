import { DataTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { TamperNoteInstance, TamperNoteModel } from '../types.js';

export const TAMPER_NOTES_TABLE = 'audit_tamper_notes';

/** Initialize the TamperNote model. Append-only, like the ledger itself. */
export function defineTamperNoteModel(sequelize: Sequelize): TamperNoteModel {
  return sequelize.define<TamperNoteInstance>(
    'TamperNote',
    {
      id: {
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
        primaryKey: true,
        allowNull: false,
      },
      entryId: {
        type: DataTypes.UUID,
        allowNull: false,
        field: 'entry_id',
      },
      storedChecksum: {
        type: DataTypes.STRING(64),
        allowNull: false,
        field: 'stored_checksum',
      },
      computedChecksum: {
        type: DataTypes.STRING(64),
        allowNull: false,
        field: 'computed_checksum',
      },
      detectedBy: {
        type: DataTypes.STRING(20),
        allowNull: false,
        field: 'detected_by',
        validate: {
          isIn: [['verify', 'verifyById', 'verifyAll']],
        },
      },
      detectedAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'detected_at',
      },
    },
    {
      tableName: TAMPER_NOTES_TABLE,
      timestamps: false,
      underscored: true,
    },
  );
}
