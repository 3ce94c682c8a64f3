import { withConflictMapping } from "./database.js";
import type { UnitOfWork } from "./unitOfWork.js";
import { NotFoundError } from "../middleware/error.js";
import type { Page, PageRequest, User } from "../types/contracts.js";

export class UserService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly now: () => Date = () => new Date()
  ) {}

  createUser(email: string, isAdmin = false): User {
    return this.unitOfWork.run((stores) =>
      withConflictMapping(() => stores.users.create(email, isAdmin, this.now().toISOString()))
    );
  }

  getUser(userId: string): User {
    const user = this.unitOfWork.stores.users.findById(userId);
    if (!user) {
      throw new NotFoundError("User", userId);
    }
    return user;
  }

  /** Deletes the user together with every recipe they own. */
  deleteUser(userId: string): void {
    const deleted = this.unitOfWork.run((stores) => stores.users.delete(userId));
    if (!deleted) {
      throw new NotFoundError("User", userId);
    }
  }

  listUsers(page: PageRequest): Page<User> {
    return this.unitOfWork.stores.users.listPage(page);
  }
}
