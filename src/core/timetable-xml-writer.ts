/**
 * Timetable XML Writer
 * Serialises a ModuleList into the timetable's XML import format
 */

import type { ModuleList, TimetableEventEntry, TimetableModule, TimetableSeries } from '../types/index.js';
import { XmlContentError } from './errors.js';

const INDENT = '  ';

// C0 controls other than tab, LF and CR, lone surrogates and U+FFFE/U+FFFF
const NON_XML_CHARACTER = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uD800-\uDFFF\uFFFE\uFFFF]/u;

export class TimetableXmlWriter {
  /**
   * Render the whole document, declaration included.
   * Modules, series and events keep the order they have in the tree.
   */
  render(timetable: ModuleList): string {
    let xml = `<?xml version='1.0' encoding='UTF-8'?>\n`;

    if (timetable.modules.length === 0) {
      return xml + '<moduleList/>\n';
    }

    xml += '<moduleList>\n';
    for (const module of timetable.modules) {
      xml += this.renderModule(module, 1);
    }
    xml += '</moduleList>\n';
    return xml;
  }

  private renderModule(module: TimetableModule, depth: number): string {
    const pad = INDENT.repeat(depth);
    let xml = `${pad}<module>\n`;
    xml += `${pad}${INDENT}<path>\n`;
    xml += this.textElement('tripos', module.path.tripos, depth + 2);
    xml += this.textElement('part', module.path.part, depth + 2);
    xml += `${pad}${INDENT}</path>\n`;
    xml += this.textElement('name', module.name, depth + 1);
    for (const series of module.series) {
      xml += this.renderSeries(series, depth + 1);
    }
    xml += `${pad}</module>\n`;
    return xml;
  }

  private renderSeries(series: TimetableSeries, depth: number): string {
    const pad = INDENT.repeat(depth);
    let xml = `${pad}<series>\n`;
    xml += this.textElement('uniqueid', series.uniqueId, depth + 1);
    xml += this.textElement('name', series.name, depth + 1);
    for (const event of series.events) {
      xml += this.renderEvent(event, depth + 1);
    }
    xml += `${pad}</series>\n`;
    return xml;
  }

  private renderEvent(event: TimetableEventEntry, depth: number): string {
    const pad = INDENT.repeat(depth);
    let xml = `${pad}<event>\n`;
    xml += this.textElement('uniqueid', event.uniqueId, depth + 1);
    xml += this.textElement('name', event.name, depth + 1);
    xml += this.textElement('location', event.location, depth + 1);
    xml += this.textElement('lecturer', event.lecturer, depth + 1);
    xml += this.textElement('date', event.date, depth + 1);
    xml += this.textElement('start', event.start, depth + 1);
    xml += this.textElement('end', event.end, depth + 1);
    xml += this.textElement('type', event.type, depth + 1);
    xml += `${pad}</event>\n`;
    return xml;
  }

  private textElement(tag: string, text: string, depth: number): string {
    const invalid = NON_XML_CHARACTER.exec(text);
    if (invalid) {
      throw new XmlContentError(
        tag,
        `Text for <${tag}> contains ${codePoint(invalid[0])}, which XML 1.0 cannot represent: ${JSON.stringify(text)}`
      );
    }
    return `${INDENT.repeat(depth)}<${tag}>${this.escapeXML(text)}</${tag}>\n`;
  }

  /**
   * Escape XML special characters
   */
  private escapeXML(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&apos;');
  }
}

function codePoint(character: string): string {
  const value = character.codePointAt(0) ?? 0;
  return `U+${value.toString(16).toUpperCase().padStart(4, '0')}`;
}
