/**
 * @warden/shield - Vulnerability Assessor
 *
 * Heuristic, rule-based detection of prompt injection and data
 * exfiltration. Prompts are checked for attempts to subvert the model;
 * responses are checked for leaked instructions and smuggled payloads.
 */

import { truncate } from '@warden/core';
import { isAtLeast, maxRisk, raiseRisk, type ThreatLevel } from './levels.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ThreatCategory =
  | 'instruction_override'
  | 'role_override'
  | 'jailbreak'
  | 'system_prompt_extraction'
  | 'credential_extraction'
  | 'control_token'
  | 'destructive_command'
  | 'url_exfiltration'
  | 'leaked_instructions'
  | 'embedded_injection'
  | 'credential_disclosure'
  | 'markdown_exfiltration';

export interface DetectedThreat {
  category: ThreatCategory;
  description: string;
  level: ThreatLevel;
  /** The matched text, shortened for display. */
  snippet: string;
}

export interface Assessment {
  threatLevel: ThreatLevel;
  safeToSend: boolean;
  threats: DetectedThreat[];
}

interface Indicator {
  category: ThreatCategory;
  description: string;
  level: ThreatLevel;
  patterns: RegExp[];
}

// ---------------------------------------------------------------------------
// Indicator tables
// ---------------------------------------------------------------------------

const SNIPPET_MAX = 80;

/** Threat level at which text is no longer safe to send. */
export const UNSAFE_THRESHOLD: ThreatLevel = 'high';

/** Distinct indicators needed before the level is raised one step. */
const ESCALATION_COUNT = 3;

const INSTRUCTION_OVERRIDE =
  /\b(?:ignore|disregard|forget|override)\s+(?:all\s+|any\s+)?(?:of\s+)?(?:the\s+|your\s+|my\s+)?(?:previous|prior|above|earlier|preceding)\s+(?:instructions|rules|directions|prompts?|guidelines)\b/i;

const CONTROL_TOKEN = /<\|(?:im_start|im_end|endoftext|system)\|>|\[\/?INST\]|<<\/?SYS>>/i;

const PROMPT_INDICATORS: readonly Indicator[] = [
  {
    category: 'instruction_override',
    description: 'Attempt to override previous instructions',
    level: 'high',
    patterns: [INSTRUCTION_OVERRIDE],
  },
  {
    category: 'role_override',
    description: 'Attempt to reassign the assistant role',
    level: 'medium',
    patterns: [
      /\byou\s+are\s+now\s+(?:a|an|the|in|my)\b/i,
      /\b(?:act|behave|respond)\s+as\b[^.\n]{0,60}\bwithout\s+(?:any\s+)?(?:restrictions|limits|limitations|filters|rules)\b/i,
      /\bpretend\s+(?:that\s+)?(?:you\s+are|to\s+be)\b[^.\n]{0,60}\b(?:unrestricted|unfiltered|uncensored)\b/i,
    ],
  },
  {
    category: 'jailbreak',
    description: 'Known jailbreak persona or mode',
    level: 'high',
    patterns: [/\bDAN\b/, /\b(?:do\s+anything\s+now|developer\s+mode|jailbreak(?:ed)?\s+mode)\b/i],
  },
  {
    category: 'system_prompt_extraction',
    description: 'Request to reveal the system prompt',
    level: 'high',
    patterns: [
      /\b(?:reveal|show|print|display|repeat|output|tell\s+me|what\s+is|what\s+are)\s+(?:me\s+)?(?:your|the)\s+(?:system\s+prompt|initial\s+instructions|hidden\s+instructions|original\s+instructions)\b/i,
    ],
  },
  {
    category: 'credential_extraction',
    description: 'Request to disclose credentials',
    level: 'high',
    patterns: [
      /\b(?:reveal|show|print|display|list|dump|output|give\s+me|send\s+me)\s+(?:me\s+)?(?:all\s+)?(?:of\s+)?(?:your|the)\s+(?:api[\s_-]?keys?|credentials|passwords?|secrets|tokens|environment\s+variables|env\s+vars)\b/i,
    ],
  },
  {
    category: 'control_token',
    description: 'Model control token in text',
    level: 'high',
    patterns: [CONTROL_TOKEN],
  },
  {
    category: 'destructive_command',
    description: 'Destructive command',
    level: 'high',
    patterns: [
      /\b(?:delete|erase|wipe|destroy)\s+(?:everything|all\s+(?:files|data|records|tables|backups))\b/i,
      /\brm\s+-rf\s+[/~]/,
      /\bDROP\s+(?:TABLE|DATABASE)\b/i,
    ],
  },
  {
    category: 'url_exfiltration',
    description: 'Request to send data to an external URL',
    level: 'high',
    patterns: [
      /\b(?:send|post|upload|forward|exfiltrate|transmit)\b[^.\n]{0,80}\bto\s+https?:\/\/\S+/i,
    ],
  },
];

const RESPONSE_INDICATORS: readonly Indicator[] = [
  {
    category: 'leaked_instructions',
    description: 'Response reveals internal instructions',
    level: 'high',
    patterns: [
      /\b(?:my|the)\s+(?:system\s+prompt|initial\s+instructions|hidden\s+instructions)\s+(?:is|are|says|reads)\b/i,
      /<<SYS>>/,
    ],
  },
  {
    category: 'embedded_injection',
    description: 'Response carries instructions aimed at the agent',
    level: 'high',
    patterns: [INSTRUCTION_OVERRIDE, /\bnew\s+instructions\s*:/i],
  },
  {
    category: 'credential_disclosure',
    description: 'Response discloses credentials',
    level: 'medium',
    patterns: [
      /\bhere\s+(?:is|are)\s+(?:the|my|your)\s+(?:api[\s_-]?keys?|credentials|passwords?|secret\s+keys?|access\s+tokens?)\b/i,
      /\b(?:the|my)\s+(?:api[\s_-]?key|password|secret\s+key|access\s+token)\s+is\b/i,
    ],
  },
  {
    category: 'markdown_exfiltration',
    description: 'Markdown link or image with query parameters to an external host',
    level: 'high',
    patterns: [/!?\[[^\]\n]{0,200}\]\(\s*https?:\/\/[^)\s?]{0,2048}\?[^)\s=]{0,2048}=[^)\s]{0,2048}\)/i],
  },
  {
    category: 'control_token',
    description: 'Model control token in text',
    level: 'high',
    patterns: [CONTROL_TOKEN],
  },
];

// ---------------------------------------------------------------------------
// VulnerabilityAssessor class
// ---------------------------------------------------------------------------

export class VulnerabilityAssessor {
  /** Check an outgoing prompt for attempts to subvert the model. */
  assessPrompt(text: string): Assessment {
    return assess(text, PROMPT_INDICATORS);
  }

  /** Check an incoming response for leaked instructions or smuggled payloads. */
  assessResponse(text: string): Assessment {
    return assess(text, RESPONSE_INDICATORS);
  }
}

/**
 * Evaluate every indicator once. The threat level is the worst indicator
 * level, raised one step when ESCALATION_COUNT or more indicators fire.
 */
function assess(text: string, indicators: readonly Indicator[]): Assessment {
  const threats: DetectedThreat[] = [];

  for (const indicator of indicators) {
    const match = firstMatch(text, indicator.patterns);
    if (match === null) continue;

    threats.push({
      category: indicator.category,
      description: indicator.description,
      level: indicator.level,
      snippet: truncate(match, SNIPPET_MAX),
    });
  }

  let threatLevel: ThreatLevel = 'none';
  for (const threat of threats) {
    threatLevel = maxRisk(threatLevel, threat.level);
  }
  if (threats.length >= ESCALATION_COUNT) {
    threatLevel = raiseRisk(threatLevel);
  }

  return {
    threatLevel,
    safeToSend: !isAtLeast(threatLevel, UNSAFE_THRESHOLD),
    threats,
  };
}

function firstMatch(text: string, patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    const m = pattern.exec(text);
    if (m) return m[0];
  }
  return null;
}
