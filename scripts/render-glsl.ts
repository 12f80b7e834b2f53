import * as fs from 'fs';
import { compileGlslFromJson } from '../src/compiler/glsl/glsl-generator';

// Usage: npm run render -- <program.json> [glsl-version]
const [file, version] = process.argv.slice(2);

if (!file) {
  console.error('Usage: render-glsl <program.json> [glsl-version]');
  process.exit(1);
}

try {
  const json: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  process.stdout.write(compileGlslFromJson(json, { versionDirective: version }));
} catch (e) {
  console.error(`Failed to render '${file}':`, e instanceof Error ? e.message : e);
  process.exit(1);
}
