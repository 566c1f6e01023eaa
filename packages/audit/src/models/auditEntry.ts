import { DataTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { ImmutableRecordError } from '@geowarden/core';
import { AuditChangeType } from '../types.js';
import type { AuditEntryInstance, AuditEntryModel } from '../types.js';

export const AUDIT_ENTRIES_TABLE = 'audit_entries';

function rejectModification(operation: string): () => never {
  return () => {
    throw new ImmutableRecordError(AUDIT_ENTRIES_TABLE, operation);
  };
}

/**
 * Initialize the AuditEntry model on the given Sequelize instance.
 *
 * Update and destroy hooks reject every modification through the ORM;
 * triggers created by the migration do the same at the database level.
 */
export function defineAuditEntryModel(sequelize: Sequelize): AuditEntryModel {
  return sequelize.define<AuditEntryInstance>(
    'AuditEntry',
    {
      id: {
        type: DataTypes.UUID,
        primaryKey: true,
        allowNull: false,
      },
      createdAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'created_at',
      },
      actorId: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'actor_id',
      },
      changeType: {
        type: DataTypes.STRING(30),
        allowNull: false,
        field: 'change_type',
        validate: {
          isIn: [Object.values(AuditChangeType)],
        },
      },
      oldValue: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'old_value',
      },
      newValue: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'new_value',
      },
      justification: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      ipAddress: {
        type: DataTypes.STRING(45),
        allowNull: true,
        field: 'ip_address',
      },
      userAgent: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'user_agent',
      },
      notificationSent: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        field: 'notification_sent',
      },
      recipientCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        field: 'recipient_count',
      },
      checksum: {
        type: DataTypes.STRING(64),
        allowNull: false,
      },
    },
    {
      tableName: AUDIT_ENTRIES_TABLE,
      timestamps: false,
      underscored: true,
      hooks: {
        beforeUpdate: rejectModification('UPDATE'),
        beforeBulkUpdate: rejectModification('UPDATE'),
        beforeDestroy: rejectModification('DELETE'),
        beforeBulkDestroy: rejectModification('DELETE'),
        beforeUpsert: rejectModification('UPSERT'),
      },
    },
  );
}
