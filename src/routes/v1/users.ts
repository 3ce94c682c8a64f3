import { Router } from "express";
import type { Services } from "../../services/container.js";
import { userCreateBodySchema } from "../../types/schemas.js";
import { pagedBody, pageRequestOf, parseId, parseWith } from "./http.js";
import { user } from "./serializers.js";

export function createUsersRouter(services: Pick<Services, "users">): Router {
  const router = Router();
  const { users } = services;

  router.post("/users", (req, res) => {
    const body = parseWith(userCreateBodySchema, req.body);
    res.status(201).json(user(users.createUser(body.email, body.is_admin)));
  });

  router.get("/users", (req, res) => {
    const request = pageRequestOf(req);
    res.json(pagedBody(users.listUsers(request), request, "/users", user));
  });

  router.get("/users/:id", (req, res) => {
    res.json(user(users.getUser(parseId(req.params.id))));
  });

  router.delete("/users/:id", (req, res) => {
    users.deleteUser(parseId(req.params.id));
    res.status(204).end();
  });

  return router;
}
