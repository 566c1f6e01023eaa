import { DataTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { AttemptType } from '../types.js';
import type { SuspiciousAttemptInstance, SuspiciousAttemptModel } from '../types.js';

export const SUSPICIOUS_ATTEMPTS_TABLE = 'suspicious_access_attempts';

/**
 * Initialize the SuspiciousAccessAttempt model. Rows are written once by
 * the access engine; only the notification and resolution columns change.
 */
export function defineSuspiciousAttemptModel(sequelize: Sequelize): SuspiciousAttemptModel {
  return sequelize.define<SuspiciousAttemptInstance>(
    'SuspiciousAccessAttempt',
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
      userId: {
        type: DataTypes.STRING(255),
        allowNull: false,
        field: 'user_id',
      },
      ipAddress: {
        type: DataTypes.STRING(45),
        allowNull: false,
        field: 'ip_address',
      },
      geoRecordId: {
        type: DataTypes.INTEGER,
        allowNull: true,
        field: 'geo_record_id',
      },
      countryCode: {
        type: DataTypes.STRING(2),
        allowNull: true,
        field: 'country_code',
      },
      attemptType: {
        type: DataTypes.STRING(20),
        allowNull: false,
        field: 'attempt_type',
        validate: {
          isIn: [Object.values(AttemptType)],
        },
      },
      wasBlocked: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: true,
        field: 'was_blocked',
      },
      userAgent: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'user_agent',
      },
      details: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      itNotified: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
        field: 'it_notified',
      },
      itNotifiedAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'it_notified_at',
      },
      resolved: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      resolvedBy: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'resolved_by',
      },
      resolvedAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'resolved_at',
      },
      resolutionNotes: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'resolution_notes',
      },
    },
    {
      tableName: SUSPICIOUS_ATTEMPTS_TABLE,
      timestamps: false,
      underscored: true,
    },
  );
}
