import fs from 'fs';
import path from 'path';
import { swaggerSpec } from '../src/swagger/swagger.config';

/**
 * Write the OpenAPI document to dist/openapi.json
 */
const outputPath = path.join(__dirname, '../dist/openapi.json');

// Ensure dist directory exists
const distDir = path.dirname(outputPath);
if (!fs.existsSync(distDir)) {
  fs.mkdirSync(distDir, { recursive: true });
}

fs.writeFileSync(outputPath, JSON.stringify(swaggerSpec, null, 2));

const paths: unknown = Reflect.get(swaggerSpec, 'paths');
const endpointCount = paths && typeof paths === 'object' ? Object.keys(paths).length : 0;

console.log(`✅ OpenAPI spec generated: ${outputPath}`);
console.log(`   Endpoints found: ${endpointCount}`);
