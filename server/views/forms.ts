import { READ_STATUSES, type Entry, type User } from "@server/db/schema";
import { READ_STATUS_LABELS } from "@server/lib/micropub-request";
import { errorList, layout, type Html } from "@server/views/layout";
import { html } from "hono/html";

export type NewPostFormValues = {
  readStatus: string;
  title: string;
  authors: string;
  isbn: string;
  doi: string;
  tags: string;
  visibility: string;
  published: string;
};

export type NewPostPageProps = {
  user: User;
  values: NewPostFormValues;
  visibilityOptions: string[];
  errors: string[];
};

export function newPostPage(props: NewPostPageProps): Html {
  const { values } = props;

  return layout(
    "New Post",
    html`<h1>New Post</h1>
      ${errorList(props.errors)}
      <form method="post" action="/new">
        <fieldset>
          <legend>Read Status</legend>
          ${READ_STATUSES.map(
            (status) =>
              html`<label
                ><input type="radio" name="read_status" value="${status}" ${status === values.readStatus ? "checked" : ""} />
                ${READ_STATUS_LABELS[status]}</label
              >`,
          )}
        </fieldset>
        <label>Title <input name="title" value="${values.title}" required /></label>
        <label>Authors <input name="authors" value="${values.authors}" /></label>
        <label>ISBN <input name="isbn" value="${values.isbn}" /></label>
        <label>DOI <input name="doi" value="${values.doi}" /></label>
        <label>Tags <input name="category" value="${values.tags}" placeholder="comma, separated" /></label>
        <label
          >Visibility
          <select name="visibility">
            ${props.visibilityOptions.map(
              (option) =>
                html`<option value="${option}" ${option === values.visibility ? "selected" : ""}>${option}</option>`,
            )}
          </select></label
        >
        <label>Published <input type="datetime-local" name="published" value="${values.published}" /></label>
        <input type="hidden" name="tz_offset" value="0" />
        <button type="submit">Post</button>
      </form>
      <script>
        document.querySelector('[name="tz_offset"]').value = new Date().getTimezoneOffset();
      </script>`,
  );
}

export type DeletePageProps = {
  entry: Entry;
  profile: User;
  errors: string[];
  isMicropubPost: boolean;
  hasMicropubDelete: boolean;
};

export function deletePage(props: DeletePageProps): Html {
  return layout(
    "Delete Post",
    html`<h1>Delete Post</h1>
      ${errorList(props.errors)}
      <p>Delete <cite>${props.entry.title}</cite>? This cannot be undone.</p>
      <form method="post" action="/delete">
        <input type="hidden" name="id" value="${props.entry.id}" />
        <label
          ><input type="checkbox" name="confirm_delete" value="yes" /> Yes, delete
          this post</label
        >
        ${props.isMicropubPost && props.hasMicropubDelete
          ? html`<label
              ><input type="checkbox" name="mp_delete" value="yes" /> Also delete it
              from ${props.profile.url ?? "my site"}</label
            >`
          : ""}
        <button type="submit">Delete</button>
      </form>`,
  );
}
