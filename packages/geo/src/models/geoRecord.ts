import { DataTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { GeoRecordInstance, GeoRecordModel } from '../types.js';

/**
 * Initialize the GeoRecord model: one row per IP address ever seen.
 */
export function defineGeoRecordModel(sequelize: Sequelize): GeoRecordModel {
  return sequelize.define<GeoRecordInstance>(
    'GeoRecord',
    {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      ipAddress: {
        type: DataTypes.STRING(45),
        allowNull: false,
        unique: true,
        field: 'ip_address',
      },
      countryCode: {
        type: DataTypes.STRING(2),
        allowNull: false,
        field: 'country_code',
      },
      countryName: {
        type: DataTypes.STRING(100),
        allowNull: true,
        field: 'country_name',
      },
      region: {
        type: DataTypes.STRING(100),
        allowNull: true,
      },
      city: {
        type: DataTypes.STRING(100),
        allowNull: true,
      },
      isp: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      organization: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      latitude: {
        type: DataTypes.DOUBLE,
        allowNull: true,
      },
      longitude: {
        type: DataTypes.DOUBLE,
        allowNull: true,
      },
      isProxy: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
        field: 'is_proxy',
      },
      isVpn: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
        field: 'is_vpn',
      },
      isTor: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
        field: 'is_tor',
      },
      threatScore: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
        field: 'threat_score',
        validate: { min: 0, max: 100 },
      },
      threatLevel: {
        type: DataTypes.STRING(10),
        allowNull: false,
        defaultValue: 'NONE',
        field: 'threat_level',
        validate: {
          isIn: [['NONE', 'LOW', 'MEDIUM', 'HIGH']],
        },
      },
      lookupDate: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'lookup_date',
      },
      firstSeenAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'first_seen',
      },
      lastSeenAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'last_seen',
      },
      accessCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 1,
        field: 'access_count',
      },
    },
    {
      tableName: 'geo_records',
      timestamps: false,
      underscored: true,
    },
  );
}
