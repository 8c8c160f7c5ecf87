/**
 * Instance family upgrade paths and connection ceilings.
 *
 * Each map is used both to decide eligibility and to price the move.
 */

export type UpgradeMap = Readonly<Record<string, string>>;

export const EC2_UPGRADE_MAP: UpgradeMap = Object.freeze({
  "t2.micro": "t3.micro",
  "t2.small": "t3.small",
  "t2.medium": "t3.medium",
  "m4.large": "m5.large",
  "m4.xlarge": "m5.xlarge",
  "c4.large": "c5.large",
  "c4.xlarge": "c5.xlarge",
});

export const RDS_UPGRADE_MAP: UpgradeMap = Object.freeze({
  "db.t3.micro": "db.t4g.micro",
  "db.t3.small": "db.t4g.small",
  "db.t3.medium": "db.t4g.medium",
  "db.r5.large": "db.r6g.large",
  "db.r5.xlarge": "db.r6g.xlarge",
  "db.m5.large": "db.m6g.large",
  "db.m5.xlarge": "db.m6g.xlarge",
});

/** Estimated `max_connections` for the small burstable classes. */
export const RDS_MAX_CONNECTIONS: Readonly<Record<string, number>> = Object.freeze({
  "db.t3.micro": 66,
  "db.t3.small": 150,
  "db.t3.medium": 312,
});

export const DEFAULT_MAX_CONNECTIONS = 5000;

export function upgradeTarget(map: UpgradeMap, type: string): string | undefined {
  return Object.hasOwn(map, type) ? map[type] : undefined;
}

export function estimateMaxConnections(instanceClass: string): number {
  return Object.hasOwn(RDS_MAX_CONNECTIONS, instanceClass)
    ? (RDS_MAX_CONNECTIONS[instanceClass] ?? DEFAULT_MAX_CONNECTIONS)
    : DEFAULT_MAX_CONNECTIONS;
}
