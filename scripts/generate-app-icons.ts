/**
 * Generate App Icons
 * Draws the chat bubble icon at every iOS and macOS size and writes the
 * AppIcon asset catalog (PNGs + Contents.json).
 *
 * Run with: npx tsx scripts/generate-app-icons.ts
 */

import * as path from 'path';
import { ICON_SET_PATH_SEGMENTS } from '../src/shared/config';
import { generateIconSet } from '../src/shared/icon-set-writer';

const OUTPUT_DIR = path.join(process.cwd(), ...ICON_SET_PATH_SEGMENTS);

async function main(): Promise<void> {
  console.log('🎨 Generating app icons...\n');

  const result = await generateIconSet({
    outputDir: OUTPUT_DIR,
    onIconWritten: (filename, size) => console.log(`✅ Generated ${filename} (${size}x${size})`),
  });

  console.log(`\n📄 Generated ${path.basename(result.manifestPath)}`);
  console.log(`🎉 ${result.files.length} icons saved to: ${result.outputDir}`);
}

main().catch(error => {
  console.error('❌ Icon generation failed:', error);
  process.exit(1);
});
