/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export function varOrDefault(envVarName: string, defaultValue: string): string {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : defaultValue;
}

export function varOrUndefined(envVarName: string): string | undefined {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function boolVarOrDefault(
  envVarName: string,
  defaultValue: boolean,
): boolean {
  return varOrDefault(envVarName, `${defaultValue}`).toLowerCase() === 'true';
}

export function intVarOrDefault(
  envVarName: string,
  defaultValue: number,
): number {
  const parsed = Number.parseInt(
    varOrDefault(envVarName, `${defaultValue}`),
    10,
  );
  return Number.isNaN(parsed) ? defaultValue : parsed;
}
