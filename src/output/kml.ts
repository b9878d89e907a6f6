/**
 * KML 2.2 export for Google Earth and similar viewers
 *
 * @module output/kml
 */

import type { CandidateDevice } from '../core/types/observation.js';
import type { SearchResultSet } from '../core/types/results.js';
import { wigleMapUrl } from '../providers/wigle-client.js';
import { deviceCity, DISCOVERY_SOURCE } from './csv.js';

const STYLE_ID = 'surveillanceCamera';
const CAMERA_ICON = 'http://maps.google.com/mapfiles/kml/shapes/camera.png';

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function placemark(device: CandidateDevice, index: number): string[] {
  const city = escapeXml(deviceCity(device));
  const lines = [
    '    <Placemark>',
    `      <name>ALPR Camera ${index} - ${city}</name>`,
    '      <description><![CDATA[',
    '        <b>ALPR Surveillance Camera</b><br/>',
    `        <b>SSID:</b> ${escapeXml(device.ssid ?? 'Unknown')}<br/>`,
    `        <b>BSSID:</b> ${escapeXml(device.bssid)}<br/>`,
    `        <b>Match:</b> ${escapeXml(`${device.matchReason} ${device.matchedSignature}`)}<br/>`,
    `        <b>Location:</b> ${city}<br/>`,
    `        <b>First Seen:</b> ${escapeXml(device.firstSeen ?? 'Unknown')}<br/>`,
    `        <b>Last Seen:</b> ${escapeXml(device.lastSeen ?? 'Unknown')}<br/>`,
    `        <b>WiGLE URL:</b> <a href="${escapeXml(wigleMapUrl(device.bssid))}">View on WiGLE</a><br/>`,
    `        <b>Discovery Source:</b> ${DISCOVERY_SOURCE}<br/>`,
    '      ]]></description>',
    `      <styleUrl>#${STYLE_ID}</styleUrl>`,
    '      <Point>',
    `        <coordinates>${device.longitude},${device.latitude},0</coordinates>`,
    '      </Point>',
    '    </Placemark>',
  ];
  return lines;
}

export function formatKml(results: SearchResultSet): string {
  const areaNames = results.metadata.areas.map((area) => area.displayName).join(', ') || 'Unknown';

  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<kml xmlns="http://www.opengis.net/kml/2.2">',
    '  <Document>',
    `    <name>ALPR Surveillance Cameras - ${escapeXml(areaNames)}</name>`,
    '    <description>Discovered surveillance camera locations</description>',
    `    <Style id="${STYLE_ID}">`,
    '      <IconStyle>',
    '        <scale>1.2</scale>',
    '        <Icon>',
    `          <href>${CAMERA_ICON}</href>`,
    '        </Icon>',
    '        <color>ff0000ff</color>',
    '      </IconStyle>',
    '      <LabelStyle>',
    '        <scale>0.8</scale>',
    '      </LabelStyle>',
    '    </Style>',
    ...results.devices.flatMap((device, index) => placemark(device, index + 1)),
    '  </Document>',
    '</kml>',
  ];

  return `${lines.join('\n')}\n`;
}
