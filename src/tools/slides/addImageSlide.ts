import { z } from 'zod';
import type { ImageSource } from '../../presentation/slideBuilder.js';
import { PresentationNameParameter } from '../../types.js';
import type { ToolContext, ToolServer } from '../context.js';
import { failTool } from '../toolErrors.js';

export function register(server: ToolServer, context: ToolContext) {
  server.addTool({
    name: 'addImageSlide',
    description:
      'Appends a slide with a title, an image and an optional caption. Pass either a public imageUrl or base64 imageData; image data is uploaded to Google Drive and shared by link first.',
    annotations: {
      title: 'Add Image Slide',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: PresentationNameParameter.extend({
      title: z.string().describe('Slide title.'),
      imageUrl: z.string().url().optional().describe('Publicly reachable image URL.'),
      imageData: z.string().min(1).base64().optional().describe('Base64-encoded image bytes.'),
      mimeType: z
        .enum(['image/png', 'image/jpeg', 'image/gif'])
        .optional()
        .default('image/png')
        .describe('MIME type of imageData.'),
      caption: z.string().optional().default('').describe('Caption shown under the image.'),
    }).refine((data) => (data.imageUrl === undefined) !== (data.imageData === undefined), {
      message: 'Provide exactly one of imageUrl or imageData.',
      path: ['imageUrl'],
    }),
    execute: async (args, { log }) => {
      const image: ImageSource =
        args.imageUrl !== undefined
          ? { url: args.imageUrl }
          : { data: Buffer.from(args.imageData ?? '', 'base64'), mimeType: args.mimeType };
      log.info(`Adding image slide to "${args.presentationName}"`);
      try {
        await context.slides.addImageSlide(args.presentationName, args.title, image, args.caption);
        return `Added image slide '${args.title}' to presentation: ${args.presentationName}`;
      } catch (error: unknown) {
        failTool('add image slide', error, log);
      }
    },
  });
}
