import { DataTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { POLICY_ID } from '../types.js';
import type { SecurityPolicyInstance, SecurityPolicyModel } from '../types.js';

const countryCode = {
  is: /^[A-Z]{2}$/,
};

/**
 * Initialize the SecurityPolicy model. Validation rejects any id other
 * than 1; the primary key rejects a second row with id 1.
 */
export function defineSecurityPolicyModel(sequelize: Sequelize): SecurityPolicyModel {
  return sequelize.define<SecurityPolicyInstance>(
    'SecurityPolicy',
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
        validate: {
          isIn: {
            args: [[POLICY_ID]],
            msg: 'Only one security policy may exist',
          },
        },
      },
      primaryCountry: {
        type: DataTypes.STRING(2),
        allowNull: false,
        field: 'primary_country',
        validate: countryCode,
      },
      secondaryCountry: {
        type: DataTypes.STRING(2),
        allowNull: true,
        field: 'secondary_country',
        validate: countryCode,
      },
      enforcementEnabled: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
        field: 'enforcement_enabled',
      },
      adminEmail: {
        type: DataTypes.STRING(254),
        allowNull: true,
        field: 'admin_email',
      },
      itEmail: {
        type: DataTypes.STRING(254),
        allowNull: true,
        field: 'it_email',
      },
      securityEmail: {
        type: DataTypes.STRING(254),
        allowNull: true,
        field: 'security_email',
      },
      setupCompleted: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
        field: 'setup_completed',
      },
      setupCompletedBy: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'setup_completed_by',
      },
      setupCompletedAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'setup_completed_at',
      },
      previousPrimaryCountry: {
        type: DataTypes.STRING(2),
        allowNull: true,
        field: 'previous_primary_country',
      },
      primaryCountryChangedAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'primary_country_changed_at',
      },
      primaryCountryChangedBy: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'primary_country_changed_by',
      },
      previousSecondaryCountry: {
        type: DataTypes.STRING(2),
        allowNull: true,
        field: 'previous_secondary_country',
      },
      secondaryCountryChangedAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'secondary_country_changed_at',
      },
      secondaryCountryChangedBy: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'secondary_country_changed_by',
      },
      version: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 1,
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
      tableName: 'security_policies',
      timestamps: true,
      underscored: true,
    },
  );
}
