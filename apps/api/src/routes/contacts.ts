import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@contacts/shared';
import { ContactError, type ContactService } from '@contacts/domain';
import {
  ContactCreateSchema,
  ContactUpdateSchema,
  ListContactsQuerySchema,
  ContactIdParamsSchema,
  toContactInput,
  toContactPatch,
  toContactView,
} from '@contacts/proto';
import { type createAuthMiddleware, requireUser } from '../plugins/auth';
import { validate } from '../plugins/validation';

interface ContactRouteDeps {
  contactService: ContactService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

function mapContactError(err: unknown): never {
  if (err instanceof ContactError) {
    const codeMap: Record<ContactError['kind'], ErrorCode> = {
      NOT_FOUND: ErrorCode.NOT_FOUND,
      CONFLICT: ErrorCode.CONFLICT,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

export function registerContactRoutes(app: FastifyInstance, deps: ContactRouteDeps): void {
  const { contactService, authenticate } = deps;

  app.get('/contacts/', { preHandler: [authenticate] }, async (request, reply) => {
    const { user } = requireUser(request);
    const query = validate(ListContactsQuerySchema, request.query, 'Invalid query');

    const contacts = await contactService.list(user.id, query);
    return reply.status(200).send(contacts.map(toContactView));
  });

  // Registered before `/contacts/:contact_id`; Fastify prefers static segments anyway.
  app.get('/contacts/birthdays/upcoming', { preHandler: [authenticate] }, async (request, reply) => {
    const { user } = requireUser(request);
    const contacts = await contactService.upcomingBirthdays(user.id);
    return reply.status(200).send(contacts.map(toContactView));
  });

  app.get('/contacts/:contact_id', { preHandler: [authenticate] }, async (request, reply) => {
    const { user } = requireUser(request);
    const { contact_id } = validate(ContactIdParamsSchema, request.params, 'Invalid contact id');

    try {
      const contact = await contactService.get(user.id, contact_id);
      return reply.status(200).send(toContactView(contact));
    } catch (err) {
      return mapContactError(err);
    }
  });

  app.post('/contacts/', { preHandler: [authenticate] }, async (request, reply) => {
    const { user } = requireUser(request);
    const body = validate(ContactCreateSchema, request.body, 'Invalid contact data');

    try {
      const contact = await contactService.create(user.id, toContactInput(body));
      return reply.status(201).send(toContactView(contact));
    } catch (err) {
      return mapContactError(err);
    }
  });

  app.put('/contacts/:contact_id', { preHandler: [authenticate] }, async (request, reply) => {
    const { user } = requireUser(request);
    const { contact_id } = validate(ContactIdParamsSchema, request.params, 'Invalid contact id');
    const body = validate(ContactUpdateSchema, request.body, 'Invalid contact data');

    try {
      const contact = await contactService.update(user.id, contact_id, toContactPatch(body));
      return reply.status(200).send(toContactView(contact));
    } catch (err) {
      return mapContactError(err);
    }
  });

  app.delete('/contacts/:contact_id', { preHandler: [authenticate] }, async (request, reply) => {
    const { user } = requireUser(request);
    const { contact_id } = validate(ContactIdParamsSchema, request.params, 'Invalid contact id');

    try {
      await contactService.remove(user.id, contact_id);
      return reply.status(204).send();
    } catch (err) {
      return mapContactError(err);
    }
  });
}
