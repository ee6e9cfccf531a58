import type { VisionAnalysis } from "../convert/types";
import { describeCause } from "../errors";

/**
 * A vision model that describes an image as a JSON object. Throws when the
 * model cannot be reached or answers with something other than JSON.
 */
export interface VisionProvider {
  readonly name: string;
  readonly model: string;
  analyze(image: Buffer, mimeType: string): Promise<Record<string, unknown>>;
}

export const ANALYSIS_PROMPT = `You are an expert image analyst. Describe this image precisely enough that it could be reproduced almost exactly.

Return a JSON object with these fields:
{
  "summary": "One or two sentences on what the image shows",
  "scene_composition": {
    "layout": "centered, rule-of-thirds, symmetrical, diagonal, ...",
    "orientation": "landscape, portrait or square",
    "depth_layers": { "foreground": [], "midground": [], "background": [] },
    "focal_points": [{ "description": "", "position": { "x_percent": 0, "y_percent": 0 } }]
  },
  "objects": [
    {
      "name": "",
      "category": "person, animal, object, text, shape, nature, architecture, ...",
      "description": "",
      "position": { "x_percent": 0, "y_percent": 0 },
      "size": { "width_percent": 0, "height_percent": 0 },
      "attributes": { "primary_color": "#hex", "material": "", "orientation": "" }
    }
  ],
  "colors": {
    "dominant_colors": [{ "hex": "#hex", "name": "", "percentage": 0, "location": "" }],
    "palette_type": "warm, cool, neutral, monochromatic, complementary, ...",
    "contrast_level": "high, medium or low"
  },
  "text_content": [{ "text": "", "font_style": "", "color": "#hex", "position": { "x_percent": 0, "y_percent": 0 } }],
  "lighting": { "type": "", "direction": "", "shadows": "" },
  "style": { "artistic_style": "", "mood": "", "atmosphere": "" },
  "technical": { "aspect_ratio": "", "sharpness": "", "perspective": "" },
  "reproduction_prompt": "A complete text-to-image prompt that recreates this image"
}

Use exact hex codes for colors and 0-100 percentages for positions. Use null or [] for fields that do not apply. Answer with the JSON object only.`;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parses a model answer, tolerating a surrounding ```json fence. */
export function parseAnalysisJson(text: string): Record<string, unknown> {
  const unfenced = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
  const parsed: unknown = JSON.parse(unfenced);
  if (!isRecord(parsed)) {
    throw new Error("Vision response is not a JSON object");
  }
  return parsed;
}

export async function analyzeImage(
  provider: VisionProvider,
  image: Buffer,
  mimeType: string,
): Promise<VisionAnalysis> {
  try {
    const analysis = await provider.analyze(image, mimeType);
    return { success: true, provider: provider.name, model: provider.model, analysis };
  } catch (err) {
    console.warn(`[vision] ${provider.name} analysis failed: ${describeCause(err)}`);
    return {
      success: false,
      provider: provider.name,
      model: provider.model,
      error: `Vision analysis failed: ${describeCause(err)}`,
    };
  }
}
