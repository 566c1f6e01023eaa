import { DataTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { AccessExceptionInstance, AccessExceptionModel } from '../types.js';

/**
 * Initialize the AccessException model.
 *
 * `openSlot` is 1 while the exception is PENDING or APPROVED and NULL once
 * it is terminal. The unique index over (user, destination, open slot)
 * allows any number of closed exceptions but only one open one per pair.
 */
export function defineAccessExceptionModel(sequelize: Sequelize): AccessExceptionModel {
  return sequelize.define<AccessExceptionInstance>(
    'AccessException',
    {
      id: {
        type: DataTypes.UUID,
        primaryKey: true,
        allowNull: false,
      },
      userId: {
        type: DataTypes.STRING(255),
        allowNull: false,
        field: 'user_id',
      },
      destinationCountry: {
        type: DataTypes.STRING(2),
        allowNull: false,
        field: 'destination_country',
        validate: { is: /^[A-Z]{2}$/ },
      },
      reason: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      startsAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'starts_at',
      },
      endsAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'ends_at',
      },
      status: {
        type: DataTypes.STRING(10),
        allowNull: false,
        defaultValue: 'PENDING',
        validate: {
          isIn: [['PENDING', 'APPROVED', 'DENIED', 'EXPIRED', 'REVOKED']],
        },
      },
      requestedBy: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'requested_by',
      },
      sourceAttemptId: {
        type: DataTypes.UUID,
        allowNull: true,
        field: 'source_attempt_id',
      },
      decidedBy: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'decided_by',
      },
      decidedAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'decided_at',
      },
      decisionNotes: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'decision_notes',
      },
      revokedBy: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'revoked_by',
      },
      revokedAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'revoked_at',
      },
      revocationNotes: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'revocation_notes',
      },
      usageCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
        field: 'usage_count',
      },
      lastUsedAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'last_used_at',
      },
      openSlot: {
        type: DataTypes.INTEGER,
        allowNull: true,
        field: 'open_slot',
      },
      createdAt: {
        type: DataTypes.DATE,
        field: 'created_at',
      },
      updatedAt: {
        type: DataTypes.DATE,
        field: 'updated_at',
      },
    },
    {
      tableName: 'access_exceptions',
      timestamps: true,
      underscored: true,
    },
  );
}
