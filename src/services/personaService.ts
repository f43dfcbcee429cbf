import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const PersonaSchema = z.object({
  id: z.string().min(1),
  display_name: z.string().min(1),
  prompt_text: z.string().min(1),
});

export type Persona = z.infer<typeof PersonaSchema>;

export const DEFAULT_PERSONA_ID = 'coach';

/**
 * Loads the coaching persona whose prompt opens every conversation as its
 * system message.
 */
export class PersonaService {
  private readonly personas = new Map<string, Persona>();

  constructor(personasDir?: string) {
    const directory = personasDir ?? PersonaService.locatePersonasDir();
    this.loadPersonasFromDirectory(directory);

    if (!this.personas.has(DEFAULT_PERSONA_ID)) {
      throw new Error(`Persona "${DEFAULT_PERSONA_ID}" not found in ${directory}`);
    }
  }

  // Container builds run from the repo root or from dist/.
  private static locatePersonasDir(): string {
    const candidates = [
      path.join(process.cwd(), 'personas'),
      path.join(__dirname, '..', '..', 'personas'),
    ];
    const found = candidates.find((candidate) => fs.existsSync(candidate));
    if (!found) {
      throw new Error(`Personas directory not found; looked in ${candidates.join(', ')}`);
    }
    return found;
  }

  private loadPersonasFromDirectory(directory: string): void {
    const files = fs.readdirSync(directory).filter((file) => file.endsWith('.json'));

    for (const file of files) {
      const raw: unknown = JSON.parse(fs.readFileSync(path.join(directory, file), 'utf8'));
      const persona = PersonaSchema.parse(raw);
      this.personas.set(persona.id, persona);
    }
    console.log(`[PersonaService] Loaded ${this.personas.size} persona(s) from ${directory}`);
  }

  getPersona(id: string): Persona | null {
    return this.personas.get(id) ?? null;
  }

  getSystemPrompt(id: string = DEFAULT_PERSONA_ID): string {
    const persona = this.personas.get(id);
    if (!persona) {
      throw new Error(`Unknown persona "${id}"`);
    }
    return persona.prompt_text;
  }
}
