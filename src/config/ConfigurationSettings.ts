/**
 * Configuration Settings
 *
 * Reads named sections from an .ini file. The file is parsed once, on the
 * first lookup after setConfigFile().
 */

import * as fs from "fs";
import { parse } from "ini";
import { ArgumentError, ConfigurationError } from "../core/errors";

export type SettingsSection = Record<string, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toSection(values: Record<string, unknown>): SettingsSection {
  const section: SettingsSection = {};
  for (const [key, value] of Object.entries(values)) {
    // nested sections and key[] arrays are not settings values
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      section[key] = String(value);
    }
  }
  return section;
}

export class ConfigurationSettings {
  private configFile: string | null = null;
  private sections: Map<string, SettingsSection> | null = null;

  /**
   * Point the settings at an .ini file
   *
   * @throws ArgumentError when the file does not exist
   */
  setConfigFile(file: string): void {
    if (!fs.existsSync(file)) {
      throw new ArgumentError("Configuration file not found");
    }
    this.configFile = file;
    this.sections = null;
  }

  /**
   * A whole section, or null when the file has no such section
   */
  getSection(name: string): SettingsSection | null {
    const section = this.load().get(name);
    return section ? { ...section } : null;
  }

  /**
   * One value of a section, or null when the section or key is missing
   */
  getValue(section: string, key: string): string | null {
    const values = this.load().get(section);
    if (!values || !Object.prototype.hasOwnProperty.call(values, key)) {
      return null;
    }
    return values[key];
  }

  private load(): Map<string, SettingsSection> {
    if (this.sections) {
      return this.sections;
    }
    if (this.configFile === null) {
      throw new ConfigurationError("No configuration file set");
    }

    let text: string;
    try {
      text = fs.readFileSync(this.configFile, "utf-8");
    } catch (error) {
      throw new ConfigurationError(
        `Configuration file could not be loaded: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed: unknown = parse(text);
    const sections = new Map<string, SettingsSection>();
    if (isRecord(parsed)) {
      for (const [name, values] of Object.entries(parsed)) {
        if (isRecord(values)) {
          sections.set(name, toSection(values));
        }
      }
    }

    this.sections = sections;
    return sections;
  }
}
