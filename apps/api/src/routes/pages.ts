import path from "path";
import { fileURLToPath } from "url";
import { Router, type Request, type Response } from "express";

export const pagesRouter = Router();

const viewsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../views");

const page = (name: string) => (_req: Request, res: Response) => res.sendFile(path.join(viewsDir, `${name}.html`));

/** Pages behind the session: anonymous visitors go back to the login page. */
const guarded = (name: string) => (req: Request, res: Response) =>
  req.auth ? page(name)(req, res) : res.redirect("/");

pagesRouter.get("/", (req, res) => (req.auth ? res.redirect("/dashboard") : page("login")(req, res)));
pagesRouter.get("/register", page("register"));
pagesRouter.get("/dashboard", guarded("dashboard"));
pagesRouter.get("/tasks", guarded("tasks"));
