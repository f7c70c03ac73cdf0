// SPDX-License-Identifier: Apache-2.0

import {SoftwareManagerError} from '../../errors/software-manager-error.js';

export type RepoOptions = Record<string, string>;

/**
 * In-memory model of a yum repository file.
 *
 * The file is read with the rules yum applies to it: every `[section]` describes one repository, option names
 * are case-insensitive and stored lowercased, `=` or `:` delimits an option, a line starting with `#` or `;` is
 * a comment, and an indented line continues the value above it. Values are kept verbatim, a `#` or `;` inside
 * one is part of the value. Options are written back as raw `key=value` lines.
 */
export class RepoConfig {
  public static readonly BASEURL_OPTION: string = 'baseurl';

  private static readonly SECTION_HEADER: RegExp = /^\[(.+)]/;
  private static readonly COMMENT_PREFIXES: readonly string[] = ['#', ';'];
  private static readonly CONTINUATION_INDENT: string = '\t';

  private readonly sectionMap: Map<string, RepoOptions>;

  private constructor(sectionMap: Map<string, RepoOptions> = new Map()) {
    this.sectionMap = sectionMap;
  }

  public static empty(): RepoConfig {
    return new RepoConfig();
  }

  /**
   * @throws SoftwareManagerError if an option appears before the first section or a line is not an option
   */
  public static parse(text: string): RepoConfig {
    const sectionMap: Map<string, RepoOptions> = new Map();
    let section: RepoOptions | undefined;
    let lastOption: string | undefined;

    for (const [index, line] of text.split(/\r?\n/).entries()) {
      const trimmed: string = line.trim();
      if (trimmed.length === 0) {
        lastOption = undefined;
        continue;
      }
      if (RepoConfig.COMMENT_PREFIXES.some((prefix: string): boolean => trimmed.startsWith(prefix))) {
        continue;
      }

      if (section && lastOption !== undefined && /^\s/.test(line)) {
        section[lastOption] = `${section[lastOption]}\n${trimmed}`;
        continue;
      }

      const header: RegExpExecArray | null = RepoConfig.SECTION_HEADER.exec(trimmed);
      if (header) {
        const name: string = header[1];
        section = sectionMap.get(name) ?? {};
        sectionMap.set(name, section);
        lastOption = undefined;
        continue;
      }

      if (!section) {
        throw new SoftwareManagerError(`Repository file contains no section header, line ${index + 1}: '${line}'`);
      }

      const delimiter: number = trimmed.search(/[:=]/);
      const option: string = delimiter > 0 ? RepoConfig.optionName(trimmed.slice(0, delimiter)) : '';
      if (option.length === 0) {
        throw new SoftwareManagerError(`Invalid repository option, line ${index + 1}: '${line}'`);
      }
      section[option] = trimmed.slice(delimiter + 1).trim();
      lastOption = option;
    }

    return new RepoConfig(sectionMap);
  }

  private static optionName(name: string): string {
    return name.trim().toLowerCase();
  }

  public sections(): string[] {
    return [...this.sectionMap.keys()];
  }

  public hasSection(name: string): boolean {
    return this.sectionMap.has(name);
  }

  public getSection(name: string): RepoOptions | undefined {
    const options: RepoOptions | undefined = this.sectionMap.get(name);
    return options ? {...options} : undefined;
  }

  /** Returns the names of the sections whose `baseurl` equals the given url */
  public findByBaseUrl(url: string): string[] {
    return this.sections().filter(
      (name: string): boolean => this.sectionMap.get(name)?.[RepoConfig.BASEURL_OPTION] === url,
    );
  }

  public addSection(name: string, options: RepoOptions): void {
    if (this.sectionMap.has(name)) {
      throw new SoftwareManagerError(`Section '${name}' already exists`);
    }
    const section: RepoOptions = {};
    for (const [option, value] of Object.entries(options)) {
      section[RepoConfig.optionName(option)] = value;
    }
    this.sectionMap.set(name, section);
  }

  public removeSection(name: string): boolean {
    return this.sectionMap.delete(name);
  }

  /** Removes every section whose `baseurl` equals the given url and returns their names */
  public removeByBaseUrl(url: string): string[] {
    const removed: string[] = this.findByBaseUrl(url);
    for (const name of removed) {
      this.sectionMap.delete(name);
    }
    return removed;
  }

  public render(): string {
    const blocks: string[] = [];
    for (const [name, options] of this.sectionMap) {
      const lines: string[] = [`[${name}]`];
      for (const [option, value] of Object.entries(options)) {
        lines.push(`${option}=${value.replaceAll('\n', `\n${RepoConfig.CONTINUATION_INDENT}`)}`);
      }
      blocks.push(`${lines.join('\n')}\n`);
    }
    return blocks.join('\n');
  }
}
