/**
 * Space Weather Assistant
 *
 * Keyword-routed answers built from live provider data. The first topic
 * whose keywords appear in the message wins.
 */

import { readCmeSpeed, toNumber } from './fields';
import type { DonkiProvider } from './providers/donki';
import type { SwpcProvider } from './providers/swpc';
import type { ChatMessage, ChatResponse } from './types';

export interface ChatDeps {
  donki: DonkiProvider;
  swpc: SwpcProvider;
}

type Topic = 'current' | 'flares' | 'cme' | 'asteroids' | 'radiation' | 'satellites';

const TOPIC_KEYWORDS: Array<[Topic, string[]]> = [
  ['current', ['current', 'now', 'today', 'latest', 'real-time']],
  ['flares', ['solar flare', 'flare', 'x-ray']],
  ['cme', ['cme', 'coronal mass ejection', 'ejection']],
  ['asteroids', ['asteroid', 'neo', 'near earth object']],
  ['radiation', ['radiation', 'proton', 'particle']],
  ['satellites', ['satellite', 'spacecraft', 'threat']],
];

export function detectTopic(message: string): Topic | null {
  const lower = message.toLowerCase();
  for (const [topic, keywords] of TOPIC_KEYWORDS) {
    if (keywords.some((word) => lower.includes(word))) return topic;
  }
  return null;
}

function display(value: unknown, fallback: string): string {
  if (value === null || value === undefined) return fallback;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return fallback;
}

async function currentConditionsAnswer(deps: ChatDeps): Promise<ChatResponse> {
  const conditions = await deps.swpc.getCurrentConditions();
  let response = '**Current Space Weather Conditions:**\n\n';

  const latestWind = conditions.solar_wind[conditions.solar_wind.length - 1];
  if (latestWind) {
    response += `🌊 **Solar Wind:** Data recorded at ${display(latestWind[0], 'N/A')}\n`;
  }

  const latestKp = conditions.kp_index[conditions.kp_index.length - 1];
  if (latestKp) {
    const kpValue = latestKp.length > 1 ? display(latestKp[1], 'N/A') : 'N/A';
    response += `🧲 **Kp Index:** ${kpValue} (Geomagnetic activity)\n`;
  }

  response += '\n📡 Conditions are being monitored in real-time.';
  return { response, sources: ['NOAA Space Weather Prediction Center'] };
}

async function flaresAnswer(deps: ChatDeps): Promise<ChatResponse> {
  const flares = await deps.donki.getSolarFlares(7);
  const recent = flares[flares.length - 1];

  let response: string;
  if (recent) {
    response = '**Recent Solar Flare Activity:**\n\n';
    response += `🌟 Most recent: **${display(recent.classType, 'Unknown')}** class flare\n`;
    response += `⏰ Peak time: ${display(recent.peakTime, 'N/A')}\n`;
    response += `📊 Total flares in last 7 days: ${flares.length}\n\n`;
    response += 'Solar flares are classified as A, B, C, M, or X, with X being the most intense. ';
    response += 'They can affect GPS, communications, and power grids on Earth.';
  } else {
    response = 'No significant solar flare activity detected in the past 7 days. ';
    response += 'The sun is relatively quiet at the moment.';
  }

  return { response, sources: ['NASA DONKI'] };
}

async function cmeAnswer(deps: ChatDeps): Promise<ChatResponse> {
  const cmes = await deps.donki.getCmeEvents(7);
  const recent = cmes[cmes.length - 1];

  let response: string;
  if (recent) {
    response = '**Recent CME Activity:**\n\n';
    response += '💥 Most recent CME detected\n';
    response += `🚀 Speed: ${readCmeSpeed(recent) ?? 'Unknown'} km/s\n`;
    response += `⏰ Start time: ${display(recent.startTime, 'N/A')}\n`;
    response += `📊 Total CMEs in last 7 days: ${cmes.length}\n\n`;
    response += 'Coronal Mass Ejections are large expulsions of plasma and magnetic field from the Sun. ';
    response += 'They can cause geomagnetic storms when directed at Earth.';
  } else {
    response = 'No Coronal Mass Ejections detected in the past 7 days.';
  }

  return { response, sources: ['NASA DONKI'] };
}

async function asteroidsAnswer(deps: ChatDeps): Promise<ChatResponse> {
  const feed = await deps.donki.getNearEarthObjects(7);
  const total = toNumber(feed.element_count) ?? 0;

  let response = '**Near Earth Objects (Asteroids):**\n\n';
  response += `🪨 **${total}** near-Earth objects detected in the past week\n\n`;
  if (total > 0) {
    response += 'Most NEOs pass by Earth at safe distances. NASA tracks all objects that could ';
    response += 'potentially pose a threat. None of the currently tracked objects present an immediate danger.';
  }

  return { response, sources: ['NASA NEO API'] };
}

async function radiationAnswer(deps: ChatDeps): Promise<ChatResponse> {
  const events = await deps.donki.getRadiationBeltEnhancements(7);

  let response = '**Space Radiation Status:**\n\n';
  if (events.length > 0) {
    response += `⚡ ${events.length} radiation belt enhancement event(s) detected in the past week\n\n`;
    response += 'Radiation belt enhancements can pose risks to satellites and astronauts. ';
    response += 'These events are closely monitored for space operations.';
  } else {
    response += 'No significant radiation belt enhancements detected in the past week. ';
    response += 'Radiation levels are within normal ranges.';
  }

  return { response, sources: ['NASA DONKI'] };
}

function satellitesAnswer(): ChatResponse {
  let response = '**Satellite Threats from Space Weather:**\n\n';
  response += '🛰️ Space weather can affect satellites through:\n\n';
  response += '1. **Solar Flares:** Can damage electronics and solar panels\n';
  response += '2. **Geomagnetic Storms:** Affect satellite orbits and operations\n';
  response += '3. **Radiation Events:** Pose risks to satellite components\n\n';
  response += 'Operators receive alerts to take protective measures when severe space weather is expected.';

  return { response, sources: ['General Space Weather Knowledge'] };
}

function overviewAnswer(): ChatResponse {
  let response = '**Space Weather Overview:**\n\n';
  response += 'I can help you understand space weather conditions and phenomena:\n\n';
  response += '🌟 **Solar Flares** - Intense bursts of radiation\n';
  response += '💥 **CME** - Coronal Mass Ejections\n';
  response += '🧲 **Geomagnetic Storms** - Disturbances in Earth\'s magnetic field\n';
  response += '⚡ **Radiation Events** - Energetic particle increases\n';
  response += '🪨 **Asteroids** - Near-Earth objects\n\n';
  response += 'Ask me about current conditions, recent events, or specific phenomena!';

  return { response, sources: [] };
}

// History is accepted for API compatibility; answers depend on the latest message only
export async function generateChatResponse(
  deps: ChatDeps,
  message: string,
  _history: ChatMessage[] = []
): Promise<ChatResponse> {
  switch (detectTopic(message)) {
    case 'current':
      return currentConditionsAnswer(deps);
    case 'flares':
      return flaresAnswer(deps);
    case 'cme':
      return cmeAnswer(deps);
    case 'asteroids':
      return asteroidsAnswer(deps);
    case 'radiation':
      return radiationAnswer(deps);
    case 'satellites':
      return satellitesAnswer();
    default:
      return overviewAnswer();
  }
}
