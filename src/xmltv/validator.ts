/**
 * XML Validation
 * Parses the generated guide back before it replaces the published file
 */

import { XMLParser } from 'fast-xml-parser';

export interface ValidationResult {
  valid: boolean;
  error?: string;
  channels?: number;
  programmes?: number;
}

function createParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (name) => name === 'channel' || name === 'programme',
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate XML string is well-formed
 */
export function validateXML(xmlString: string): ValidationResult {
  if (!xmlString || xmlString.trim().length === 0) {
    return {
      valid: false,
      error: 'XML string is empty',
    };
  }

  if (!xmlString.trim().startsWith('<?xml')) {
    return {
      valid: false,
      error: 'Missing XML declaration',
    };
  }

  try {
    // Throws if malformed
    createParser().parse(xmlString, true);
    return { valid: true };
  } catch (error) {
    return {
      valid: false,
      error: `XML parsing failed: ${error}`,
    };
  }
}

/**
 * Validate XMLTV structure: a <tv> root with channels and programmes,
 * every programme pointing at a declared channel
 */
export function validateXMLTV(xmlString: string): ValidationResult {
  const basicValidation = validateXML(xmlString);
  if (!basicValidation.valid) {
    return basicValidation;
  }

  const parsed: unknown = createParser().parse(xmlString);
  const tv = isRecord(parsed) ? parsed.tv : undefined;

  if (!isRecord(tv)) {
    return {
      valid: false,
      error: 'Missing <tv> root element',
    };
  }

  const channels = Array.isArray(tv.channel) ? tv.channel.filter(isRecord) : [];
  const programmes = Array.isArray(tv.programme) ? tv.programme.filter(isRecord) : [];

  if (channels.length === 0) {
    return {
      valid: false,
      error: 'No channels found in XMLTV',
    };
  }

  if (programmes.length === 0) {
    return {
      valid: false,
      error: 'No programmes found in XMLTV',
    };
  }

  const channelIds = new Set(channels.map((channel) => channel['@_id']));
  for (const programme of programmes) {
    if (!channelIds.has(programme['@_channel'])) {
      return {
        valid: false,
        error: `Programme references undeclared channel "${String(programme['@_channel'])}"`,
      };
    }
    if (typeof programme['@_start'] !== 'string' || programme['@_start'] === '') {
      return {
        valid: false,
        error: 'Programme without start attribute',
      };
    }
  }

  return {
    valid: true,
    channels: channels.length,
    programmes: programmes.length,
  };
}
